import { createServer, type Server } from 'node:net'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { findAvailablePort, isPortAvailable } from './port.js'

const HOST = '127.0.0.1'

describe('port utilities', () => {
  let blocker: Server
  let takenPort: number

  beforeEach(async () => {
    blocker = createServer()
    await new Promise<void>(resolve => blocker.listen(0, HOST, resolve))
    const address = blocker.address()
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address')
    }
    takenPort = address.port
  })

  afterEach(async () => {
    await new Promise<void>(resolve => blocker.close(() => resolve()))
  })

  it('reports a bound port as unavailable', async () => {
    expect(await isPortAvailable(takenPort, HOST)).toBe(false)
  })

  it('skips a taken port', async () => {
    const port = await findAvailablePort(takenPort, HOST, 10)
    expect(port).toBeGreaterThan(takenPort)
    expect(port).toBeLessThan(takenPort + 10)
  })
})
