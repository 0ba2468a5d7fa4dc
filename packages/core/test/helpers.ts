import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

const created: string[] = []

// Writes `files` (relative path -> content) into a fresh temp directory.
export function makeRepo(files: Record<string, string> = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'dephealth-'))
  created.push(root)
  writeFiles(root, files)
  return root
}

export function writeFiles(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const file = path.join(root, rel)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, content)
  }
}

// Moves a file's mtime forward so cache comparisons see a change.
export function touch(root: string, rel: string, offsetMs = 5000) {
  const file = path.join(root, rel)
  const next = new Date(fs.statSync(file).mtimeMs + offsetMs)
  fs.utimesSync(file, next, next)
}

export function cleanupRepos() {
  while (created.length) {
    const dir = created.pop()
    if (dir) fs.rmSync(dir, { recursive: true, force: true })
  }
}
