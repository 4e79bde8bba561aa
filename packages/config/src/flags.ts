/** Runtime flags controlling diagram diagnostics. */
export interface DiagramFlags {
  /** Emit a log line whenever a shape or diagram is built from unvalidated input. */
  TRACE_CONSTRUCTION: boolean
  /** Emit a log line whenever a construction is rejected. */
  TRACE_FAILURES: boolean
}

export type DiagramFlagKey = keyof DiagramFlags

/** All flag keys for iteration. */
export const FLAG_KEYS: DiagramFlagKey[] = [
  'TRACE_CONSTRUCTION',
  'TRACE_FAILURES',
]

/** Default flag values. Diagnostics are silent unless asked for. */
export const DEFAULT_FLAGS: DiagramFlags = {
  TRACE_CONSTRUCTION: false,
  TRACE_FAILURES: false,
}

export const ENV_PREFIX = 'FREE_DIAGRAMS_'

function readEnvFlag(key: string): boolean | undefined {
  if (typeof process !== 'undefined' && process.env) {
    const val = process.env[key]
    if (val === 'true' || val === '1') return true
    if (val === 'false' || val === '0') return false
  }
  return undefined
}

const overrides: Partial<DiagramFlags> = {}

/** Read the in-process overrides currently in effect. */
export function readOverrides(): Partial<DiagramFlags> {
  return { ...overrides }
}

/** Override a flag for the rest of the process (or until cleared). */
export function setFlagOverride(key: DiagramFlagKey, value: boolean): void {
  overrides[key] = value
}

/** Remove a flag override (revert to env/default). */
export function clearFlagOverride(key: DiagramFlagKey): void {
  delete overrides[key]
}

/** Clear all in-process flag overrides. */
export function clearAllFlagOverrides(): void {
  for (const key of FLAG_KEYS) delete overrides[key]
}

/** Resolve a single flag: in-process override > env override > default. */
export function resolveFlag(key: DiagramFlagKey): boolean {
  const override = overrides[key]
  if (override !== undefined) return override
  return readEnvFlag(`${ENV_PREFIX}${key}`) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag at once. Read at call time, so env changes are picked up. */
export function resolveFlags(): DiagramFlags {
  return {
    TRACE_CONSTRUCTION: resolveFlag('TRACE_CONSTRUCTION'),
    TRACE_FAILURES: resolveFlag('TRACE_FAILURES'),
  }
}
