import { buildApp } from './app.js'
import { loadConfig } from './config.js'

const config = loadConfig()
const { app } = buildApp({ config })

async function listenWithFallback(startPort: number, host: string) {
  const attempts = 10
  for (let i = 0; i <= attempts; i++) {
    const tryPort = startPort + i
    try {
      await app.listen({ port: tryPort, host })
      app.log.info(`API listening on http://localhost:${tryPort}`)
      return
    } catch (err) {
      if (!isAddressInUse(err)) {
        app.log.error({ err }, `Failed to start server on port ${tryPort}`)
        throw err
      }
      app.log.warn(`Port ${tryPort} in use. Trying next...`)
    }
  }
  // Last resort: let OS choose an ephemeral port
  try {
    await app.listen({ port: 0, host })
    const addr = app.server.address()
    const chosen = typeof addr === 'object' && addr ? addr.port : '(unknown)'
    app.log.warn(`All ports ${startPort}-${startPort + attempts} busy. Using ephemeral port ${chosen}.`)
  } catch (err) {
    app.log.error({ err }, 'Failed to start server even on ephemeral port')
    process.exit(1)
  }
}

function isAddressInUse(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'EADDRINUSE'
}

await listenWithFallback(config.port, config.host)
