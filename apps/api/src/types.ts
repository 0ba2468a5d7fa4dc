import type { DependencyHealthEngine } from '@dephealth/core'

export type ID = string

export interface Workspace { id: ID; root: string; createdAt: string }

export interface WorkspaceKpis { score: number; critical: number; warning: number; outdated: number }

export interface Store {
  workspaces: Workspace[]
  getWorkspace(id: ID): Workspace | undefined
  getEngine(id: ID): DependencyHealthEngine | undefined
}

export interface ApiError { code: 'BAD_REQUEST' | 'NOT_FOUND' | 'INTERNAL'; message: string }
