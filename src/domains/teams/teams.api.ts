import type { Transport } from '../../core/transport.ts'
import type { TApiResponse, TCredentialOverrides } from '../../core/types.ts'
import {
  changeTeamResponseSchema,
  type TChangeTeamRequest,
  type TChangeTeamResponse,
} from '../../types/api.ts'

export type TTeamsApiOptions = {
  transport: Transport
}

export interface TTeamsApi {
  changeLicensesTeam(request: TChangeTeamRequest): Promise<TApiResponse<TChangeTeamResponse>>
  changeLicensesTeamRaw(
    body: string,
    credentials?: TCredentialOverrides,
  ): Promise<TApiResponse<TChangeTeamResponse>>
}

/** `POST /customer/changeLicensesTeam`, typed and raw. */
export class TeamsApi implements TTeamsApi {
  private transport: Transport

  constructor(options: TTeamsApiOptions) {
    this.transport = options.transport
  }

  public async changeLicensesTeam(
    request: TChangeTeamRequest,
  ): Promise<TApiResponse<TChangeTeamResponse>> {
    return await this.transport.request('POST', '/customer/changeLicensesTeam', {
      body: request,
      schema: changeTeamResponseSchema,
    })
  }

  public async changeLicensesTeamRaw(
    body: string,
    credentials?: TCredentialOverrides,
  ): Promise<TApiResponse<TChangeTeamResponse>> {
    return await this.transport.request('POST', '/customer/changeLicensesTeam', {
      body,
      credentials,
      schema: changeTeamResponseSchema,
    })
  }
}
