// ──────────────────────────────────────────────
// Switchboard - Function Configuration Types
// ──────────────────────────────────────────────

export const SUPPORTED_HTTP_METHODS = ["GET", "POST", "PUT", "DELETE"] as const;

export type SupportedHttpMethod = (typeof SUPPORTED_HTTP_METHODS)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type HeaderMap = Record<string, string>;
export type JsonPayload = Record<string, JsonValue>;

export const MIN_TIMEOUT_SECONDS = 1;
export const MAX_TIMEOUT_SECONDS = 300;

export interface FunctionConfig {
  id: number;
  name: string;
  description: string;
  endpointUrl: string;
  /** Upper case for rows written through the store; rows from other writers may hold anything. */
  httpMethod: string;
  headers: HeaderMap;
  payload: JsonPayload;
  timeoutSeconds: number;
  isActive: boolean;
  buttonColor: string;
  displayOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface FunctionConfigInput {
  name: string;
  description?: string;
  endpointUrl: string;
  httpMethod?: string;
  headers?: HeaderMap;
  payload?: JsonPayload;
  timeoutSeconds?: number;
  isActive?: boolean;
  buttonColor?: string;
  displayOrder?: number;
}

export type FunctionConfigPatch = Partial<FunctionConfigInput>;
