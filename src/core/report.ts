/**
 * Batch conversion report.
 *
 * Same text goes to the console and to conversion-result_<YYYYMMDD_HHMMSS>.txt
 * in the output directory.
 */

import { mkdirSync, writeFileSync } from 'fs'
import { join } from 'path'
import type { StrategyName } from './mesh-types'

export interface BatchResult {
  file: string
  status: 'success' | 'failed'
  vertexCount: number
  faceCount: number
  strategy: StrategyName | null
  elapsedMs: number
  error?: string
}

const RULE = '='.repeat(70)

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** Local-time stamp used in the report file name. */
export function reportTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`
  return `${date}_${time}`
}

export function formatSummary(results: BatchResult[]): string {
  const ok = results.filter(r => r.status === 'success')
  const failed = results.filter(r => r.status === 'failed')

  const lines = [
    RULE,
    'Batch conversion finished',
    `Total: ${results.length}, succeeded: ${ok.length}, failed: ${failed.length}`,
  ]

  if (ok.length > 0) {
    lines.push('', 'Succeeded:')
    for (const r of ok) {
      lines.push(`  ${r.file}`)
      lines.push(`    vertices: ${r.vertexCount}, faces: ${r.faceCount}, strategy: ${r.strategy ?? '-'}, time: ${seconds(r.elapsedMs)}`)
    }
  }

  if (failed.length > 0) {
    lines.push('', 'Failed:')
    for (const r of failed) {
      lines.push(`  ${r.file}`)
      lines.push(`    error: ${r.error ?? 'unknown'}, time: ${seconds(r.elapsedMs)}`)
    }
  }

  lines.push(RULE)
  return lines.join('\n') + '\n'
}

/** Write the summary into `dir` and return the report path. */
export function writeReport(dir: string, results: BatchResult[], now: Date = new Date()): string {
  mkdirSync(dir, { recursive: true })
  const reportPath = join(dir, `conversion-result_${reportTimestamp(now)}.txt`)
  writeFileSync(reportPath, formatSummary(results), 'utf-8')
  return reportPath
}
