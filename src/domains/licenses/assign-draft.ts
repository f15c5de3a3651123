import { compact } from '../../core/utils.ts'
import type { TAssigneeContact, TAssignLicenseRequest, TLicenseFromTeam } from '../../types/api.ts'

export type TContactDraft = Partial<TAssigneeContact>
export type TLicenseFromTeamDraft = Partial<TLicenseFromTeam>

export type TAssignLicenseDraftFields = {
  contact?: TContactDraft
  includeOfflineActivationCode?: boolean
  sendEmail?: boolean
  licenseId?: string
  license?: TLicenseFromTeamDraft
}

/**
 * Immutable builder for assign bodies the typed request cannot express:
 * missing fields, partial contacts, or both `licenseId` and `license` at once.
 * Absent fields are left out of the serialized JSON.
 *
 * ```ts
 * AssignLicenseDraft.from(validRequest).withoutContactField('email').serialize()
 * ```
 */
export class AssignLicenseDraft {
  private readonly fields: TAssignLicenseDraftFields

  constructor(fields: TAssignLicenseDraftFields = {}) {
    this.fields = fields
  }

  static from(request: TAssignLicenseRequest): AssignLicenseDraft {
    return new AssignLicenseDraft({
      contact: { ...request.contact },
      includeOfflineActivationCode: request.includeOfflineActivationCode,
      sendEmail: request.sendEmail,
      licenseId: request.licenseId,
      license: request.license ? { ...request.license } : undefined,
    })
  }

  with<K extends keyof TAssignLicenseDraftFields>(
    key: K,
    value: TAssignLicenseDraftFields[K],
  ): AssignLicenseDraft {
    const next: TAssignLicenseDraftFields = { ...this.fields }
    next[key] = value
    return new AssignLicenseDraft(next)
  }

  without(...keys: Array<keyof TAssignLicenseDraftFields>): AssignLicenseDraft {
    const next: TAssignLicenseDraftFields = { ...this.fields }
    for (const key of keys) delete next[key]
    return new AssignLicenseDraft(next)
  }

  withContactField(key: keyof TContactDraft, value: string): AssignLicenseDraft {
    const contact: TContactDraft = { ...this.fields.contact }
    contact[key] = value
    return this.with('contact', contact)
  }

  withoutContactField(...keys: Array<keyof TContactDraft>): AssignLicenseDraft {
    const contact: TContactDraft = { ...this.fields.contact }
    for (const key of keys) delete contact[key]
    return this.with('contact', contact)
  }

  withoutLicenseField(...keys: Array<keyof TLicenseFromTeamDraft>): AssignLicenseDraft {
    const license: TLicenseFromTeamDraft = { ...this.fields.license }
    for (const key of keys) delete license[key]
    return this.with('license', license)
  }

  toJSON(): Record<string, unknown> {
    return compact({ ...this.fields })
  }

  serialize(): string {
    return JSON.stringify(this.toJSON())
  }
}
