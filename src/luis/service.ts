import { decryptString, encryptString } from '../secrets.js'

export interface LuisKeys {
  authoringKey: string
  subscriptionKey: string
}

/** Connected-service record for a LUIS application. */
export interface LuisService extends LuisKeys {
  type: 'luis'
  id: string
  name: string
  appId: string
  version: string
  region: string
}

export function createLuisService(fields: Partial<Omit<LuisService, 'type'>> & Pick<LuisService, 'appId'>): LuisService {
  return {
    type: 'luis',
    id: fields.id ?? fields.appId,
    name: fields.name ?? fields.appId,
    appId: fields.appId,
    authoringKey: fields.authoringKey ?? '',
    subscriptionKey: fields.subscriptionKey ?? '',
    version: fields.version ?? '',
    region: fields.region ?? 'westus'
  }
}

export function getLuisEndpoint(service: Pick<LuisService, 'region'>): string {
  return `https://${service.region}.api.cognitive.microsoft.com`
}

function transformKeys<T extends LuisKeys>(service: T, transform: (value: string) => string): T {
  return {
    ...service,
    authoringKey: service.authoringKey ? transform(service.authoringKey) : service.authoringKey,
    subscriptionKey: service.subscriptionKey ? transform(service.subscriptionKey) : service.subscriptionKey
  }
}

// Only the two key fields are secret; ids, version and region stay readable.
export function encryptLuisService<T extends LuisKeys>(service: T, secret: string): T {
  return transformKeys(service, value => encryptString(value, secret))
}

export function decryptLuisService<T extends LuisKeys>(service: T, secret: string): T {
  return transformKeys(service, value => decryptString(value, secret))
}
