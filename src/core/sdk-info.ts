import pkg from '../../package.json' with { type: 'json' }

export const CLIENT_NAME = 'account-api-harness'
export const CLIENT_VERSION = pkg.version
export const USER_AGENT = `${CLIENT_NAME}/${CLIENT_VERSION}`
