/**
 * Parse strategy orchestrator.
 *
 * Runs the strategies in their fixed priority order against one file and
 * stops at the first plausible mesh:
 *
 *   not-started → trying(0) → trying(1) → … → accepted | exhausted
 *
 * Strategy failures never escape; they become attempt records. Only running
 * out of strategies is reported, carrying the last attempt's reason.
 */

import { DecodeError, type DecodeErrorKind } from './errors'
import { DEFAULT_INDEX_SEARCH, type IndexSearchTunables } from './index-locator'
import type { BlockCodec } from './lz4'
import { NO_HINTS, type DecodeHints, type ParseOutcome, type StrategyAttempt, type StrategyName } from './mesh-types'
import { DEFAULT_STRATEGIES, type ParseStrategy, type StrategyContext } from './strategies'
import { explainImplausible, MIN_VERTEX_COUNT } from './validator'

export interface DecodeOptions {
  codec: BlockCodec
  hints?: DecodeHints
  search?: Partial<IndexSearchTunables>
  minVertexCount?: number
  /** Receives step-by-step diagnostics; nothing is logged without it. */
  trace?: (msg: string) => void
  strategies?: readonly ParseStrategy[]
}

export type DecoderState =
  | { phase: 'not-started' }
  | { phase: 'trying'; index: number; strategy: StrategyName }
  | { phase: 'accepted'; strategy: StrategyName }
  | { phase: 'exhausted' }

function describe(state: DecoderState): string {
  switch (state.phase) {
    case 'trying': return `trying ${state.index + 1}: ${state.strategy}`
    case 'accepted': return `accepted: ${state.strategy}`
    default: return state.phase
  }
}

export function decodeMesh(file: Buffer, options: DecodeOptions): ParseOutcome {
  const hints = options.hints ?? NO_HINTS
  const minVertexCount = options.minVertexCount ?? MIN_VERTEX_COUNT
  const strategies = options.strategies ?? DEFAULT_STRATEGIES
  const trace = options.trace ?? (() => {})

  const ctx: StrategyContext = {
    codec: options.codec,
    hints,
    search: { ...DEFAULT_INDEX_SEARCH, ...options.search },
    explain: mesh => explainImplausible(mesh, minVertexCount),
    trace,
  }

  const attempts: StrategyAttempt[] = []
  let state: DecoderState = { phase: 'not-started' }
  trace(describe(state))

  for (let i = 0; i < strategies.length; i++) {
    const strategy = strategies[i]
    if (strategy.appliesTo && !strategy.appliesTo(hints)) {
      attempts.push({ strategy: strategy.name, ok: false, message: 'skipped for this asset' })
      trace(`skip ${strategy.name}`)
      continue
    }

    state = { phase: 'trying', index: i, strategy: strategy.name }
    trace(describe(state))

    let errorKind: DecodeErrorKind
    let message: string
    try {
      const mesh = strategy.run(file, ctx)
      const reason = ctx.explain(mesh)
      if (reason === null) {
        attempts.push({ strategy: strategy.name, ok: true })
        state = { phase: 'accepted', strategy: strategy.name }
        trace(describe(state))
        return { ok: true, mesh, strategy: strategy.name, attempts }
      }
      errorKind = 'ImplausibleResult'
      message = reason
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e
      errorKind = e.kind
      message = e.message
    }

    attempts.push({ strategy: strategy.name, ok: false, errorKind, message })
    trace(`${strategy.name} failed: [${errorKind}] ${message}`)
  }

  state = { phase: 'exhausted' }
  trace(describe(state))

  const last = [...attempts].reverse().find(a => a.errorKind !== undefined)
  return {
    ok: false,
    error: 'AllStrategiesFailed',
    message: last ? `${last.strategy}: ${last.message}` : 'no strategy applied',
    attempts,
  }
}
