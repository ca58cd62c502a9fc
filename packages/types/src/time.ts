export type TimeSource = "api2" | "api1->api2";

export interface TimeResponse {
  timestamp: string;
  timezone: string;
  request_id: string;
  source: TimeSource;
}

export type DownstreamErrorCode =
  | "DOWNSTREAM_UNAVAILABLE"
  | "DOWNSTREAM_TIMEOUT"
  | "DOWNSTREAM_BAD_STATUS"
  | "DOWNSTREAM_BAD_RESPONSE";

export interface DownstreamErrorBody {
  error: DownstreamErrorCode;
  message: string;
  request_id: string;
  timestamp: string;
  upstream_status?: number;
}
