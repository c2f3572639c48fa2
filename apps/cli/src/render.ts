/**
 * Report renderings: summary, per-session list, table, CSV.
 */

import { isOpen } from '@uptime-ledger/core'
import type { LedgerStatistics, SessionRecord } from '@uptime-ledger/core'
import { formatEpoch, formatPercent, formatSpan } from './format.js'
import type { FormatOptions } from './format.js'

export interface RenderOptions extends FormatOptions {
  /** Show kernel labels in the summary. */
  kernel?: boolean
}

const LABEL_WIDTH = 20

function line(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`
}

function endLabel(record: SessionRecord): string {
  if (isOpen(record)) return '-'
  return record.shutdownKind === 'graceful' ? 'OK' : 'BAD'
}

// ── Summary ──

export function renderSummary(stats: LedgerStatistics, options: RenderOptions = {}): string {
  const span = (seconds: number): string => formatSpan(seconds, options)
  const at = (epoch: number): string => formatEpoch(epoch, options)
  const withKernel = (label: string): string => (options.kernel ? `  with ${label}` : '')

  const lines = [
    line('System startups', `${stats.sessionCount} since ${at(stats.firstBootEpoch)}`),
    line('System shutdowns', `${stats.gracefulCount} ok  <-  ${stats.ungracefulCount} bad`),
    line('System uptime', `${formatPercent(stats.uptimeRatio)} - ${span(stats.totalUptime)}`),
    line('System downtime', `${formatPercent(stats.downtimeRatio)} - ${span(stats.totalDowntime)}`),
    line('System life', span(stats.systemLifetime)),
  ]
  if (options.kernel) lines.push(line('System kernels', String(stats.distinctKernelCount)))

  lines.push(
    '',
    line('Longest uptime', `${span(stats.maxUptime.seconds)} from ${at(stats.maxUptime.bootEpoch)}${withKernel(stats.maxUptime.kernelLabel)}`),
    line('Average uptime', span(stats.averageUptime)),
    line('Shortest uptime', `${span(stats.minUptime.seconds)} from ${at(stats.minUptime.bootEpoch)}${withKernel(stats.minUptime.kernelLabel)}`),
    '',
  )

  if (stats.maxDowntime && stats.minDowntime) {
    lines.push(
      line('Longest downtime', `${span(stats.maxDowntime.seconds)} from ${at(stats.maxDowntime.shutdownEpoch)}${withKernel(stats.maxDowntime.kernelLabel)}`),
      line('Average downtime', span(stats.averageDowntime)),
      line('Shortest downtime', `${span(stats.minDowntime.seconds)} from ${at(stats.minDowntime.shutdownEpoch)}${withKernel(stats.minDowntime.kernelLabel)}`),
    )
  } else {
    lines.push(line('Longest downtime', '-'), line('Average downtime', span(0)), line('Shortest downtime', '-'))
  }

  lines.push('', line('Current uptime', `${span(stats.currentUptime)} since ${at(stats.currentBootEpoch)}`))
  return lines.join('\n')
}

// ── List ──

export function renderList(records: readonly SessionRecord[], options: RenderOptions = {}): string {
  return records
    .map((record) => {
      const block = [
        line('Startup', `${record.sequence}  at  ${formatEpoch(record.bootEpoch, options)}`),
        line('Uptime', formatSpan(record.uptimeSeconds, options)),
      ]
      if (!isOpen(record)) {
        block.push(
          line('Shutdown', `${endLabel(record)}  at  ${formatEpoch(record.shutdownEpoch, options)}`),
          line('Downtime', formatSpan(record.downtimeSeconds, options)),
        )
      }
      block.push(line('Kernel', record.kernelLabel))
      return block.join('\n')
    })
    .join('\n\n')
}

// ── Table ──

const TABLE_HEADER = ['No.', 'Startup', 'Uptime', 'Shutdown', 'End', 'Downtime', 'Kernel']

export function renderTable(records: readonly SessionRecord[], options: RenderOptions = {}): string {
  const rows = records.map((record) => [
    String(record.sequence),
    formatEpoch(record.bootEpoch, options),
    formatSpan(record.uptimeSeconds, options),
    isOpen(record) ? '-' : formatEpoch(record.shutdownEpoch, options),
    endLabel(record),
    isOpen(record) ? '-' : formatSpan(record.downtimeSeconds, options),
    record.kernelLabel,
  ])

  const all = [TABLE_HEADER, ...rows]
  const widths = TABLE_HEADER.map((_, col) => Math.max(...all.map((row) => (row[col] ?? '').length)))

  return all
    .map((row) => row.map((cell, col) => cell.padEnd(widths[col] ?? 0)).join('  ').trimEnd())
    .join('\n')
}

// ── CSV ──

const CSV_HEADER = 'sequence,boot_epoch,uptime_seconds,shutdown_epoch,shutdown_kind,downtime_seconds,kernel_label'

function csvCell(value: string | number): string {
  const text = String(value)
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function renderCsv(records: readonly SessionRecord[]): string {
  const rows = records.map((r) =>
    [r.sequence, r.bootEpoch, r.uptimeSeconds, r.shutdownEpoch, r.shutdownKind, r.downtimeSeconds, r.kernelLabel]
      .map(csvCell)
      .join(','),
  )
  return [CSV_HEADER, ...rows].join('\n')
}
