import { defineCommand } from 'citty'
import { getPublicIp } from '../actions/publicIp.js'
import { createActionContext } from '../actions/context.js'

export const ipCommand = defineCommand({
  meta: { name: 'ip', description: 'Print the public IP address' },
  async run() {
    const ctx = await createActionContext()
    const ip = await getPublicIp(ctx.logger)
    if (ip) {
      process.stdout.write(`${ip}\n`)
    } else {
      ctx.logger.warn('public ip: unavailable')
    }
  }
})
