import type { TSettings } from '../config/settings.ts'
import { Transport, type TFetch } from '../core/transport.ts'
import { LicensesApi } from '../domains/licenses/licenses.api.ts'
import { TeamsApi } from '../domains/teams/teams.api.ts'
import { TokenApi } from '../domains/token/token.api.ts'

export type TAccountApiClientOptions = {
  settings: TSettings
  /** Key sent as X-Api-Key; defaults to the organisation admin key */
  apiKey?: string
  fetchImplementation?: TFetch
}

/**
 * Client for the account API, grouped by resource.
 * Owns a connection pool: call close() when done, or use withClient().
 */
export class AccountApiClient {
  public readonly token: TokenApi
  public readonly licenses: LicensesApi
  public readonly teams: TeamsApi

  private transport: Transport

  constructor(options: TAccountApiClientOptions) {
    this.transport = new Transport({
      baseUrl: options.settings.baseUrl,
      credentials: {
        apiKey: options.apiKey ?? options.settings.orgAdminKey,
        customerCode: options.settings.customerCode,
      },
      fetchImplementation: options.fetchImplementation,
    })

    this.token = new TokenApi({ transport: this.transport })
    this.licenses = new LicensesApi({ transport: this.transport })
    this.teams = new TeamsApi({ transport: this.transport })
  }

  get isClosed(): boolean {
    return this.transport.isClosed
  }

  public async close(): Promise<void> {
    await this.transport.close()
  }
}

/** Runs `work` with a fresh client and releases its connections however `work` ends. */
export async function withClient<T>(
  options: TAccountApiClientOptions,
  work: (client: AccountApiClient) => Promise<T>,
): Promise<T> {
  const client = new AccountApiClient(options)
  try {
    return await work(client)
  } finally {
    await client.close()
  }
}
