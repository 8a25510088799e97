import {formatDuration, formatSize} from '../core/utils.js'
import type {ScanStats} from './media-scanner.js'

/** Escapes text for Telegram's HTML parse mode. Quotes are left as is. */
export function escapeHtml(text: string): string {
  return text
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export type ScanReportContext = {
  directory: string;
  scannedAt: Date;
  durationMs: number;
  /** Resident set size of the scanning process, in bytes. */
  rssBytes: number;
}

export function formatScanReport(stats: ScanStats, context: ScanReportContext): string {
  return [
    '🎬 <b>Media scan report</b>',
    '',
    `📅 <b>Scanned at</b>: ${formatTimestamp(context.scannedAt)}`,
    `📊 <b>Videos</b>: ${stats.total}`,
    `💬 <b>Subtitles</b>: ${stats.subtitleCount}`,
    `💾 <b>Total size</b>: ${formatSize(stats.totalSize)}`,
    `🆕 <b>New yesterday</b>: ${stats.newYesterday}`,
    `⏱️ <b>Duration</b>: ${(context.durationMs / 1000).toFixed(1)}s`,
    `🧠 <b>Memory</b>: ${(context.rssBytes / 1024 / 1024).toFixed(1)} MB`,
    `📁 <b>Directory</b>: ${escapeHtml(context.directory)}`
  ].join('\n')
}

export function formatBuildSucceeded(image: string, version: string, durationMs: number): string {
  return [
    '✅ <b>Image built</b>',
    '',
    `🐳 <b>Image</b>: ${escapeHtml(image)}`,
    `🏷️ <b>Version</b>: ${escapeHtml(version)}`,
    `⏱️ <b>Duration</b>: ${formatDuration(durationMs)}`
  ].join('\n')
}

export function formatBuildFailed(project: string, message: string): string {
  return [
    '❌ <b>Build failed</b>',
    '',
    `📦 <b>Project</b>: ${escapeHtml(project)}`,
    `⚠️ <b>Error</b>: ${escapeHtml(message)}`
  ].join('\n')
}
