import { Agent, fetch } from 'undici'
import { ConfigurationError } from './errors.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TApiResponse,
  TCredentialOverrides,
  TCredentials,
  THttpMethod,
  TRequestOptions,
} from './types.ts'
import { normalizeBaseUrl, parseBody } from './utils.ts'

export const API_KEY_HEADER = 'X-Api-Key'
export const CUSTOMER_CODE_HEADER = 'X-Customer-Code'

export type TFetch = typeof fetch

export type TTransportOptions = {
  baseUrl: string
  credentials: TCredentials
  /** Connection pool; created per transport when omitted */
  dispatcher?: Agent
  fetchImplementation?: TFetch
}

/**
 * Authenticated request/response plumbing for the account API.
 * Never throws on an HTTP status: every response becomes a TApiResponse.
 * Network failures still reject.
 */
export class Transport {
  private baseUrl: string
  private credentials: TCredentials
  private dispatcher: Agent
  private fetchImplementation: TFetch
  private userAgent: string = USER_AGENT
  private closed = false

  constructor(options: TTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl)
    this.credentials = options.credentials
    this.dispatcher = options.dispatcher ?? new Agent()
    this.fetchImplementation = options.fetchImplementation ?? fetch
  }

  get isClosed(): boolean {
    return this.closed
  }

  async request<TResponse>(
    httpMethod: THttpMethod,
    path: string,
    requestOptions: TRequestOptions<TResponse> = {},
  ): Promise<TApiResponse<TResponse>> {
    if (this.closed) {
      throw new ConfigurationError(`Transport is closed; cannot ${httpMethod} ${path}`)
    }

    const urlObject: URL = new URL(this.baseUrl + path)
    if (requestOptions.queryString) {
      for (const [queryKey, queryValue] of Object.entries(requestOptions.queryString)) {
        if (queryValue !== undefined) urlObject.searchParams.set(queryKey, String(queryValue))
      }
    }

    const serializedBody: string | undefined =
      requestOptions.body === undefined
        ? undefined
        : typeof requestOptions.body === 'string'
          ? requestOptions.body
          : JSON.stringify(requestOptions.body)

    const httpResponse = await this.fetchImplementation(urlObject, {
      method: httpMethod,
      headers: {
        ...this.authHeaders(requestOptions.credentials),
        'user-agent': this.userAgent,
        ...(serializedBody !== undefined ? { 'content-type': 'application/json' } : {}),
      },
      body: serializedBody,
      dispatcher: this.dispatcher,
    })

    const rawBody: string = await httpResponse.text()
    return {
      statusCode: httpResponse.status,
      body: parseBody(rawBody, requestOptions.schema),
      rawBody,
    }
  }

  /** Releases the connection pool. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.dispatcher.close()
  }

  private authHeaders(overrides?: TCredentialOverrides): Record<string, string> {
    const apiKey: string = overrides?.apiKey ?? this.credentials.apiKey
    const customerCode: string = overrides?.customerCode ?? this.credentials.customerCode

    const headers: Record<string, string> = {}
    if (apiKey !== '') headers[API_KEY_HEADER] = apiKey
    if (customerCode !== '') headers[CUSTOMER_CODE_HEADER] = customerCode
    return headers
  }
}
