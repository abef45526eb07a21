export interface StatusResponse {
  status: string;
}

/**
 * Envelope produced by `TransformInterceptor` around every JSON payload.
 */
export interface ApiResponse<T> {
  statusCode: number;
  message: string;
  data: T;
}
