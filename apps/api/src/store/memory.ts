import path from 'node:path'
import { DependencyHealthEngine, type EngineOptions } from '@dephealth/core'
import type { ID, Store, Workspace } from '../types.js'

const genId = (p: string) => `${p}_${Math.random().toString(36).slice(2, 10)}`

// One engine per repository root; engines own their scan caches.
export class WorkspaceStore implements Store {
  workspaces: Workspace[] = []
  private engines = new Map<ID, DependencyHealthEngine>()

  constructor(private readonly engineOptions: (root: string) => EngineOptions = () => ({})) {}

  register(root: string): { workspace: Workspace; created: boolean } {
    const resolved = path.resolve(root)
    const existing = this.workspaces.find(w => w.root === resolved)
    if (existing) return { workspace: existing, created: false }
    const workspace: Workspace = { id: genId('ws'), root: resolved, createdAt: new Date().toISOString() }
    this.workspaces.push(workspace)
    this.engines.set(workspace.id, new DependencyHealthEngine(resolved, this.engineOptions(resolved)))
    return { workspace, created: true }
  }

  getWorkspace(id: ID) { return this.workspaces.find(w => w.id === id) }
  getEngine(id: ID) { return this.engines.get(id) }
  listWorkspaces() { return this.workspaces }
}
