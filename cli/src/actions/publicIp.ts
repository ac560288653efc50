import type { Logger } from '../installers/types.js'
import { errorMessage, fetchText } from '../installers/utils.js'

export const PUBLIC_IP_ENDPOINTS = ['https://api.ipify.org', 'https://ifconfig.me/ip'] as const
const PUBLIC_IP_TIMEOUT_MS = 5000

const IPV4 = /^(?:\d{1,3}\.){3}\d{1,3}$/
const IPV6 = /^[0-9a-f:]+$/i

export function looksLikeIp(value: string): boolean {
  return IPV4.test(value) || (value.includes(':') && IPV6.test(value))
}

export async function getPublicIp(
  logger?: Logger,
  endpoints: readonly string[] = PUBLIC_IP_ENDPOINTS
): Promise<string | undefined> {
  for (const url of endpoints) {
    try {
      const body = (await fetchText(url, PUBLIC_IP_TIMEOUT_MS)).trim()
      if (looksLikeIp(body)) return body
    } catch (error) {
      logger?.log(`public ip: ${url}: ${errorMessage(error)}`)
    }
    logger?.warn(`public ip: no usable answer from ${url}`)
  }
  return undefined
}
