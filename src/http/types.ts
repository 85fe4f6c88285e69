export interface HttpRequest {
  url: string
  query?: Record<string, string>
}

export interface HttpResponse {
  status: number
  statusText: string
  content: string
}

export interface HttpJsonResponse<T> extends HttpResponse {
  /** Deserialized body; only set for 200 responses */
  data?: T
}

/**
 * Transport seam for provider calls. Implementations reject on network
 * faults and resolve with any HTTP status.
 */
export interface HttpClient {
  execute: (request: HttpRequest) => Promise<HttpResponse>
  executeJson: <T>(
    request: HttpRequest,
    parse: (value: unknown) => T,
  ) => Promise<HttpJsonResponse<T>>
}
