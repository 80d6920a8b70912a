/**
 * Field readers for untyped JSON/YAML input
 *
 * Each reader accepts snake_case and camelCase spellings and appends a
 * problem description instead of throwing, so a loader can report every
 * bad field at once.
 */

export type UnknownRecord = Record<string, unknown>

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toCamel(name: string): string {
  return name.replace(/_([a-z])/g, (_, ch: string) => ch.toUpperCase())
}

export class RecordReader {
  constructor(
    private readonly data: UnknownRecord,
    /** Prefix for problem messages, e.g. `repository "billing"` */
    private readonly label: string,
    private readonly problems: string[]
  ) {}

  /** Raw value under `name` or its camelCase spelling */
  raw(name: string): unknown {
    if (name in this.data) return this.data[name]
    const camel = toCamel(name)
    return camel in this.data ? this.data[camel] : undefined
  }

  has(name: string): boolean {
    return this.raw(name) !== undefined && this.raw(name) !== null
  }

  string(name: string): string | undefined {
    const value = this.raw(name)
    if (value === undefined || value === null) return undefined
    if (typeof value === 'string') return value
    if (typeof value === 'number') return String(value)
    this.problem(`${name} must be a string`)
    return undefined
  }

  requiredString(name: string): string {
    const value = this.string(name)
    if (value === undefined) {
      // a present value of the wrong type was already reported by string()
      if (!this.has(name)) this.problem(`${name} is required`)
      return ''
    }
    if (value.trim() === '') {
      this.problem(`${name} must not be empty`)
      return ''
    }
    return value
  }

  number(name: string): number | undefined {
    const value = this.raw(name)
    if (value === undefined || value === null) return undefined
    if (typeof value === 'number' && Number.isFinite(value)) return value
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value)
    }
    this.problem(`${name} must be a number`)
    return undefined
  }

  boolean(name: string): boolean | undefined {
    const value = this.raw(name)
    if (value === undefined || value === null) return undefined
    if (typeof value === 'boolean') return value
    this.problem(`${name} must be a boolean`)
    return undefined
  }

  stringList(name: string): string[] {
    const value = this.raw(name)
    if (value === undefined || value === null) return []
    if (!Array.isArray(value)) {
      this.problem(`${name} must be a list`)
      return []
    }
    const result: string[] = []
    value.forEach((item, i) => {
      if (typeof item === 'string') result.push(item)
      else if (isRecord(item) && typeof item.name === 'string') result.push(item.name)
      else this.problem(`${name}[${i}] must be a string`)
    })
    return result
  }

  /** ISO timestamp; accepts Date values produced by YAML */
  timestamp(name: string): string | undefined {
    const value = this.raw(name)
    if (value === undefined || value === null) return undefined
    const parsed = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null
    if (!parsed || Number.isNaN(parsed.getTime())) {
      this.problem(`${name} must be an ISO timestamp`)
      return undefined
    }
    return parsed.toISOString()
  }

  record(name: string): UnknownRecord | undefined {
    const value = this.raw(name)
    if (value === undefined || value === null) return undefined
    if (isRecord(value)) return value
    this.problem(`${name} must be a mapping`)
    return undefined
  }

  problem(message: string): void {
    this.problems.push(`${this.label}: ${message}`)
  }
}
