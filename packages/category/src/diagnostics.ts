/**
 * Structured construction diagnostics.
 *
 * Emits one JSON line per event to stdout:
 *   { ts, event, ...fields }
 *
 * Silent unless TRACE_CONSTRUCTION (built events) or TRACE_FAILURES
 * (rejected events) resolves to true.
 */

import { resolveFlag } from '@free-diagrams/config'
import type { ShapeMismatchError } from '@free-diagrams/graph'

export type TraceEvent = 'shape.built' | 'diagram.built' | 'shape.rejected' | 'diagram.rejected'

export type TraceFields = Record<string, string | number | boolean | readonly number[]>

export function trace(event: TraceEvent, fields: TraceFields): void {
  const flag = event.endsWith('.rejected') ? 'TRACE_FAILURES' : 'TRACE_CONSTRUCTION'
  if (!resolveFlag(flag)) return

  const entry = {
    ts: new Date().toISOString(),
    event,
    ...fields,
  }
  process.stdout.write(JSON.stringify(entry) + '\n')
}

/** Trace a rejected construction and hand the error back for throwing. */
export function rejected(error: ShapeMismatchError): ShapeMismatchError {
  const event = error.shape === 'free-diagram' || error.shape === 'edges'
    ? 'diagram.rejected'
    : 'shape.rejected'
  trace(event, {
    shape: error.shape,
    aspect: error.aspect,
    positions: error.positions,
  })
  return error
}
