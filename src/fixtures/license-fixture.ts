import { logger } from '../core/logger.ts'
import type { TApiResponse } from '../core/types.ts'
import type { TLicensesApi } from '../domains/licenses/licenses.api.ts'
import type { TTeamsApi } from '../domains/teams/teams.api.ts'
import type { TLicense } from '../types/api.ts'

export type TLicenseFixtureOptions = {
  licenses: Pick<TLicensesApi, 'listLicenses' | 'revokeLicense'>
  teams: Pick<TTeamsApi, 'changeLicensesTeam'>
  /** Team the fixture draws licenses from and returns transfers to */
  sourceTeamId: number
}

export type TEnsureAssignableOptions = {
  /** Count only licenses that may also move between teams */
  transferable?: boolean
}

export type TAssignableReport = {
  required: number
  available: number
  /** Licenses revoked to reach `required`, in revoke order */
  revoked: string[]
  shortfall: number
  /** Set when the source team could not be listed */
  reason?: string
}

export type TReconcileReport = {
  revoked: string[]
  restored: string[]
  failed: string[]
}

/** Receives the diagnostic when a precondition cannot be met; expected to skip the test. */
export type TSkipHook = (note: string) => void

/**
 * Per-test bookkeeping around the shared remote license pool.
 *
 * Before a test: makes sure enough licenses in the source team can be assigned.
 * After a test: revokes what the test assigned and moves back what it transferred.
 * Neither direction throws on an API refusal; refusals are logged, because the
 * server's revoke cooldown can make them unavoidable.
 */
export class LicenseFixture {
  private licenses: TLicenseFixtureOptions['licenses']
  private teams: TLicenseFixtureOptions['teams']
  private sourceTeamId: number
  private assigned: Set<string> = new Set()
  private transferred: Set<string> = new Set()

  constructor(options: TLicenseFixtureOptions) {
    this.licenses = options.licenses
    this.teams = options.teams
    this.sourceTeamId = options.sourceTeamId
  }

  /** Registers a license assigned by the test, to be revoked on reconcile(). */
  public track(licenseId: string): void {
    this.assigned.add(licenseId)
  }

  /** Registers a license moved out of the source team, to be moved back on reconcile(). */
  public trackTransfer(licenseId: string): void {
    this.transferred.add(licenseId)
  }

  public get pending(): { assigned: string[]; transferred: string[] } {
    return { assigned: [...this.assigned], transferred: [...this.transferred] }
  }

  /**
   * Tops the source team up to `count` assignable licenses by revoking assigned ones.
   * Revokes refused by the server (cooldown) are logged and the next candidate is tried.
   */
  public async ensureAssignable(
    count: number,
    options: TEnsureAssignableOptions = {},
  ): Promise<TAssignableReport> {
    const transferable: boolean = options.transferable ?? false
    const report: TAssignableReport = { required: count, available: 0, revoked: [], shortfall: 0 }

    const unassigned = await this.licenses.listLicenses({
      assignmentStatus: 'UNASSIGNED',
      teamId: this.sourceTeamId,
    })
    if (unassigned.statusCode !== 200 || !unassigned.body) {
      report.shortfall = count
      report.reason = describeListingFailure('unassigned', unassigned)
      return report
    }

    report.available = unassigned.body.filter(
      (license) => license.isAvailableToAssign === true && matchesTransfer(license, transferable),
    ).length
    if (report.available >= count) return report

    const assigned = await this.licenses.listLicenses({
      assignmentStatus: 'ASSIGNED',
      teamId: this.sourceTeamId,
    })
    if (assigned.statusCode !== 200 || !assigned.body) {
      logger.warn(
        `Cannot free licenses in team ${this.sourceTeamId}: ${describeListingFailure('assigned', assigned)}`,
        assigned.rawBody,
      )
    }
    const candidates: TLicense[] = (assigned.statusCode === 200 ? (assigned.body ?? []) : []).filter(
      (license) =>
        license.isAvailableToAssign !== true &&
        license.isSuspended !== true &&
        matchesTransfer(license, transferable),
    )

    for (const candidate of candidates) {
      if (report.available >= count) break
      if (await this.tryRevoke(candidate.licenseId)) {
        report.available++
        report.revoked.push(candidate.licenseId)
      }
    }

    report.shortfall = Math.max(0, count - report.available)
    return report
  }

  /**
   * ensureAssignable(), then hands a diagnostic naming the shortfall to `skip`
   * when the team still has too few licenses.
   */
  public async requireAssignable(
    skip: TSkipHook,
    count: number,
    options: TEnsureAssignableOptions = {},
  ): Promise<TAssignableReport> {
    const report: TAssignableReport = await this.ensureAssignable(count, options)
    if (report.shortfall > 0) {
      const kind: string = options.transferable ? 'assignable transferable' : 'assignable'
      const note: string =
        `Need ${count} ${kind} license(s) in team ${this.sourceTeamId}, ` +
        `found ${report.available} (short by ${report.shortfall})` +
        (report.reason ? `: ${report.reason}` : '')
      logger.warn(note)
      skip(note)
    }
    return report
  }

  /**
   * Reverts everything tracked so far. Tracking is cleared before any call is made,
   * so a repeated reconcile() never processes an id twice.
   */
  public async reconcile(): Promise<TReconcileReport> {
    const assigned: string[] = [...this.assigned]
    const transferred: string[] = [...this.transferred]
    this.assigned.clear()
    this.transferred.clear()

    const report: TReconcileReport = { revoked: [], restored: [], failed: [] }

    for (const licenseId of assigned) {
      try {
        const response = await this.licenses.revokeLicense(licenseId)
        if (response.statusCode === 200) {
          logger.info(`Revoked license ${licenseId}`)
          report.revoked.push(licenseId)
        } else {
          logger.warn(
            `Could not revoke license ${licenseId} (HTTP ${response.statusCode}); manual cleanup may be required`,
            response.rawBody,
          )
          report.failed.push(licenseId)
        }
      } catch (error) {
        logger.error(`Revoking license ${licenseId} failed`, error)
        report.failed.push(licenseId)
      }
    }

    if (transferred.length === 0) return report

    try {
      const response = await this.teams.changeLicensesTeam({
        licenseIds: transferred,
        targetTeamId: this.sourceTeamId,
      })
      if (response.statusCode === 200) {
        const moved: string[] = response.body?.licenseIds ?? transferred
        for (const licenseId of transferred) {
          if (moved.includes(licenseId)) report.restored.push(licenseId)
          else report.failed.push(licenseId)
        }
        if (report.restored.length > 0) {
          logger.info(`Restored ${report.restored.length} license(s) to team ${this.sourceTeamId}`)
        }
        if (report.restored.length < transferred.length) {
          logger.warn(
            `Some licenses were not moved back to team ${this.sourceTeamId}`,
            response.rawBody,
          )
        }
      } else {
        logger.warn(
          `Could not restore licenses to team ${this.sourceTeamId} (HTTP ${response.statusCode}); manual cleanup may be required`,
          response.rawBody,
        )
        report.failed.push(...transferred)
      }
    } catch (error) {
      logger.error(`Restoring licenses to team ${this.sourceTeamId} failed`, error)
      report.failed.push(...transferred)
    }

    return report
  }

  private async tryRevoke(licenseId: string): Promise<boolean> {
    try {
      const response = await this.licenses.revokeLicense(licenseId)
      if (response.statusCode === 200) return true
      logger.warn(
        `Could not revoke license ${licenseId} (HTTP ${response.statusCode}); trying next candidate`,
        response.rawBody,
      )
    } catch (error) {
      logger.warn(`Revoking license ${licenseId} failed; trying next candidate`, error)
    }
    return false
  }
}

function describeListingFailure(status: string, response: TApiResponse<unknown>): string {
  const detail: string =
    response.statusCode === 200 ? 'HTTP 200 with an unparseable body' : `HTTP ${response.statusCode}`
  return `listing ${status} licenses returned ${detail}`
}

function matchesTransfer(license: TLicense, transferable: boolean): boolean {
  return !transferable || license.isTransferableBetweenTeams === true
}
