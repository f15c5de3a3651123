import { z } from 'zod'

// Responses

const namedEntitySchema = z.object({
  id: z.number().int().nullish(),
  name: z.string().nullish(),
})

const knownAssigneeSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('USER'),
    email: z.string().nullish(),
    name: z.string().nullish(),
  }),
  z.object({
    type: z.literal('SERVER'),
    name: z.string().nullish(),
  }),
  z.object({
    type: z.literal('LICENSE_KEY'),
    name: z.string().nullish(),
  }),
])

/** An assignee whose `type` is missing or not one of the known kinds; `rawType` keeps what was sent. */
const unknownAssigneeSchema = z
  .object({
    type: z.unknown(),
    email: z.string().nullish(),
    name: z.string().nullish(),
  })
  .transform((assignee) => ({
    type: 'UNKNOWN' as const,
    rawType: typeof assignee.type === 'string' ? assignee.type : undefined,
    email: assignee.email,
    name: assignee.name,
  }))

export const assigneeSchema = z.union([knownAssigneeSchema, unknownAssigneeSchema])

export type TAssignee = z.infer<typeof assigneeSchema>
export type TAssigneeType = TAssignee['type']

export const licenseSchema = z.object({
  licenseId: z.string(),
  isAvailableToAssign: z.boolean().nullish(),
  isTransferableBetweenTeams: z.boolean().nullish(),
  isSuspended: z.boolean().nullish(),
  isTrial: z.boolean().nullish(),
  assignee: assigneeSchema.nullish(),
  product: z
    .object({
      code: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
  team: namedEntitySchema.nullish(),
  subscription: z
    .object({
      validUntilDate: z.string().nullish(),
      isOutdated: z.boolean().nullish(),
      isAutomaticallyRenewed: z.boolean().nullish(),
    })
    .nullish(),
  lastSeen: z
    .object({
      lastAssignmentDate: z.string().nullish(),
      lastSeenDate: z.string().nullish(),
      isOfflineCodeGenerated: z.boolean().nullish(),
    })
    .nullish(),
})

export type TLicense = z.infer<typeof licenseSchema>

/**
 * Entries are validated one by one. An entry that does not parse, such as one
 * without a `licenseId`, is dropped and the rest of the list is kept.
 */
export const licenseListSchema = z.array(z.unknown()).transform((entries) =>
  entries.flatMap((entry): TLicense[] => {
    const result = licenseSchema.safeParse(entry)
    return result.success ? [result.data] : []
  }),
)

export const tokenSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('CUSTOMER'),
    role: z.string().nullish(),
    teams: z.array(namedEntitySchema).nullish(),
  }),
  z.object({
    type: z.literal('TEAM'),
    team: namedEntitySchema.extend({ role: z.string().nullish() }).nullish(),
  }),
])

export type TToken = z.infer<typeof tokenSchema>
export type TTokenScope = TToken['type']

/**
 * Only the transferred id list is documented; any other keys the API
 * returns are kept on the object but not modelled.
 */
export const changeTeamResponseSchema = z
  .object({
    licenseIds: z.array(z.string()).nullish(),
  })
  .passthrough()

export type TChangeTeamResponse = z.infer<typeof changeTeamResponseSchema>

// Requests

export type TAssignmentStatus = 'ASSIGNED' | 'UNASSIGNED'

export type TLicenseFilter = {
  assignmentStatus?: TAssignmentStatus
  teamId?: number
}

export type TAssigneeContact = {
  email: string
  firstName: string
  lastName: string
}

/** Picks any available license of a product from a team's pool. */
export type TLicenseFromTeam = {
  productCode: string
  team: number
}

type TAssignLicenseBase = {
  contact: TAssigneeContact
  includeOfflineActivationCode: boolean
  sendEmail: boolean
}

/** Exactly one of `licenseId` or `license` is sent. */
export type TAssignLicenseRequest =
  | (TAssignLicenseBase & { licenseId: string; license?: never })
  | (TAssignLicenseBase & { license: TLicenseFromTeam; licenseId?: never })

export type TChangeTeamRequest = {
  licenseIds: string[]
  targetTeamId: number
}
