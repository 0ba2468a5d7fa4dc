export class DependencyHealthError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class InvalidSeverityError extends DependencyHealthError {
  readonly value: unknown

  constructor(value: unknown) {
    super('INVALID_SEVERITY', `invalid severity: ${JSON.stringify(value)} (expected critical, warning or info)`)
    this.value = value
  }
}

export class ConflictShapeError extends DependencyHealthError {
  constructor(pkg: string, requiredBy: number, versions: number) {
    super('CONFLICT_SHAPE', `conflict for ${pkg} has ${requiredBy} requesters but ${versions} versions`)
  }
}
