// go.sum lines: `<module> <version>[/go.mod] <hash>`
export function parseGoSum(text: string): Map<string, string> {
  const modules = new Map<string, string>()
  for (const raw of text.split(/\r?\n/)) {
    const [mod, version] = raw.trim().split(/\s+/)
    if (!mod || !version) continue
    if (!modules.has(mod)) modules.set(mod, version.replace(/\/go\.mod$/, ''))
  }
  return modules
}
