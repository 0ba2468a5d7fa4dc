import fs from 'node:fs'
import Fastify, { type FastifyReply, type FastifyServerOptions } from 'fastify'
import {
  computeScoreBreakdown,
  criticalCount,
  formatDependencyReport,
  formatQuickStatus,
  warningCount,
  type DependencyHealthEngine
} from '@dephealth/core'
import { WorkspaceStore } from './store/memory.js'
import type { ApiConfig } from './config.js'
import type { ApiError, Workspace, WorkspaceKpis } from './types.js'

export interface BuildOptions {
  config?: Partial<ApiConfig>
  logger?: FastifyServerOptions['logger']
}

type IdParams = { Params: { id: string } }

export function buildApp(options: BuildOptions = {}) {
  const config = options.config ?? {}
  const app = Fastify({ logger: options.logger ?? true })
  const store = new WorkspaceStore(root => ({
    ttlMs: config.ttlMs,
    // an empty list must not mask the workspace config file
    skip: config.skip?.length ? config.skip : undefined,
    logger: app.log.child({ root })
  }))

  const notFound = (reply: FastifyReply) =>
    reply.code(404).send({ code: 'NOT_FOUND', message: 'workspace not found' } satisfies ApiError)

  function kpis(engine: DependencyHealthEngine): WorkspaceKpis {
    const report = engine.getReport()
    return {
      score: report.healthScore,
      critical: criticalCount(report),
      warning: warningCount(report),
      outdated: report.outdated.length
    }
  }

  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode ?? 500
    if (status >= 500) {
      req.log.error({ err }, 'Request failed')
      return reply.code(500).send({ code: 'INTERNAL', message: 'internal error' } satisfies ApiError)
    }
    return reply.code(status).send({ code: 'BAD_REQUEST', message: err.message } satisfies ApiError)
  })

  // Minimal CORS for local dev
  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', '*')
    reply.header('Access-Control-Allow-Headers', '*')
    reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    return payload
  })
  app.options('/*', async (req, reply) => {
    return reply.code(204).send()
  })

  app.get('/', async (req, reply) => {
    const links = store.listWorkspaces()
      .map(w => `<li><code>${escapeHtml(w.root)}</code> → <a href="/workspaces/${w.id}/report.md">Report</a> · <a href="/workspaces/${w.id}/status">Status</a></li>`)
      .join('')
    const html = `<!doctype html><html><head><meta charset="utf-8"><title>dephealth API</title>
  <style>body{font-family:system-ui,sans-serif;margin:24px} code{background:#f3f4f6;padding:2px 4px;border-radius:4px}</style></head>
  <body><h1>dephealth API</h1>
  <h3>Useful Endpoints</h3>
  <ul>
    <li><code>GET /workspaces</code></li>
    <li><code>POST /workspaces</code></li>
    <li><code>GET /workspaces/:id</code></li>
    <li><code>GET /workspaces/:id/report.json</code></li>
    <li><code>GET /workspaces/:id/report.md</code></li>
    <li><code>GET /workspaces/:id/score</code></li>
    <li><code>GET /workspaces/:id/status</code></li>
    <li><code>GET /workspaces/:id/install-commands</code></li>
    <li><code>POST /workspaces/:id/invalidate</code></li>
  </ul>
  <h3>Workspaces</h3>
  <ul>${links || '<li>No workspaces yet</li>'}</ul>
  </body></html>`
    return reply.type('text/html').send(html)
  })

  app.get('/workspaces', async () => store.listWorkspaces())

  app.post<{ Body: { path?: unknown } | null | undefined }>('/workspaces', async (req, reply) => {
    const dir = req.body?.path
    if (typeof dir !== 'string' || !dir.trim()) {
      return reply.code(400).send({ code: 'BAD_REQUEST', message: 'path is required' } satisfies ApiError)
    }
    if (!fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory()) {
      return reply.code(400).send({ code: 'BAD_REQUEST', message: 'path is not a directory' } satisfies ApiError)
    }
    const { workspace, created } = store.register(dir)
    if (created) app.log.info({ workspace: workspace.id, root: workspace.root }, 'Workspace registered')
    return reply.code(created ? 201 : 200).send(workspace)
  })

  app.get<IdParams>('/workspaces/:id', async (req, reply) => {
    const workspace = store.getWorkspace(req.params.id)
    const engine = store.getEngine(req.params.id)
    if (!workspace || !engine) return notFound(reply)
    const fresh = engine.isFresh()
    const body: Workspace & { fresh: boolean; kpis: WorkspaceKpis } = { ...workspace, fresh, kpis: kpis(engine) }
    return body
  })

  app.get<IdParams>('/workspaces/:id/report.json', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    return engine.getReport()
  })

  app.get<IdParams>('/workspaces/:id/score', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    return computeScoreBreakdown(engine.getReport())
  })

  app.get<IdParams>('/workspaces/:id/status', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    return { status: formatQuickStatus(engine.getReport()) }
  })

  app.get<IdParams>('/workspaces/:id/report.md', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    return reply.type('text/markdown; charset=utf-8').send(formatDependencyReport(engine.getReport(), engine.profileLookup()))
  })

  app.get<IdParams>('/workspaces/:id/install-commands', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    return { commands: engine.suggestInstallCommands() }
  })

  app.post<IdParams>('/workspaces/:id/invalidate', async (req, reply) => {
    const engine = store.getEngine(req.params.id)
    if (!engine) return notFound(reply)
    engine.invalidate()
    return { ok: true, fresh: engine.isFresh() }
  })

  if (config.root) store.register(config.root)

  return { app, store }
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;')
}
