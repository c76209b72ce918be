export type HttpMethod = 'GET' | 'POST';

/**
 * Outbound request description
 */
export type TransportRequest = {
  method?: HttpMethod;
  url: string;
  /** Appended to the URL's search parameters */
  query?: Record<string, string>;
  /** Merged over the client's default headers */
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

/**
 * Raw response; payload interpretation is left to the caller
 */
export type TransportResponse = {
  url: string;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  text: string;
};

/**
 * The only component allowed to perform network I/O
 */
export type Transport = {
  /**
   * @throws TransportError on timeout, connection failure, abort or non-2xx status
   */
  fetch(request: TransportRequest): Promise<TransportResponse>;
};
