import { z } from 'zod'
import type { Transport } from '../../core/transport.ts'
import type { TApiResponse } from '../../core/types.ts'
import { tokenSchema, type TToken } from '../../types/api.ts'

export type TTokenApiOptions = {
  transport: Transport
}

/** Thin HTTP client over the token endpoints. */
export interface TTokenApi {
  getToken(): Promise<TApiResponse<TToken>>
  getTokenWithoutAuth(): Promise<TApiResponse<TToken>>
  rotateToken(): Promise<TApiResponse<unknown>>
}

export class TokenApi implements TTokenApi {
  private transport: Transport

  constructor(options: TTokenApiOptions) {
    this.transport = options.transport
  }

  /** `GET /token`: scope, role and teams of the current key. */
  public async getToken(): Promise<TApiResponse<TToken>> {
    return await this.transport.request('GET', '/token', { schema: tokenSchema })
  }

  /** `GET /token` with neither auth header. */
  public async getTokenWithoutAuth(): Promise<TApiResponse<TToken>> {
    return await this.transport.request('GET', '/token', {
      schema: tokenSchema,
      credentials: { apiKey: '', customerCode: '' },
    })
  }

  /**
   * `POST /token/rotate`: invalidates the current key and returns its replacement.
   * The replacement's shape is undocumented, so the body is kept as parsed JSON.
   */
  public async rotateToken(): Promise<TApiResponse<unknown>> {
    return await this.transport.request('POST', '/token/rotate', { schema: z.unknown() })
  }
}
