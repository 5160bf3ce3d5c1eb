/**
 * Change Detector
 *
 * Decides whether a source file needs (re)processing this run, based on the
 * "today only" date filter and the freshness of its cleaned counterpart.
 */

import { DateTime, IANAZone } from 'luxon'
import type {
  ChangeDecision,
  ChangeDetectionOptions,
  DestinationItem,
  SourceItem,
} from './types'

/**
 * Parse a store timestamp. Unparsable or absent values become null, which
 * biases the detector toward processing.
 */
export function parseTimestamp(value: string | null | undefined): DateTime | null {
  if (!value) return null
  const parsed = DateTime.fromISO(value.trim(), { setZone: true })
  return parsed.isValid ? parsed : null
}

/**
 * Resolve a timezone name, falling back to UTC for unknown zones
 */
export function resolveTimezone(name: string): string {
  return IANAZone.isValidZone(name) ? name : 'UTC'
}

export function isModifiedToday(
  modifiedTime: string | null,
  timezone: string,
  now: DateTime = DateTime.now()
): boolean {
  const modified = parseTimestamp(modifiedTime)
  if (!modified) return false

  const zone = resolveTimezone(timezone)
  return modified.setZone(zone).hasSame(now.setZone(zone), 'day')
}

/**
 * True when the destination is at least as fresh as the source. Requires
 * both timestamps to parse.
 */
export function isUpToDate(source: SourceItem, destination: DestinationItem): boolean {
  const sourceTime = parseTimestamp(source.modifiedTime)
  const destinationTime = parseTimestamp(destination.modifiedTime)
  if (!sourceTime || !destinationTime) return false
  return destinationTime.toMillis() >= sourceTime.toMillis()
}

export function passesDateFilter(source: SourceItem, options: ChangeDetectionOptions): boolean {
  if (!options.runTodayOnly) return true
  return isModifiedToday(source.modifiedTime, options.timezone, options.now)
}

export function evaluate(
  source: SourceItem,
  existingDestination: DestinationItem | null,
  options: ChangeDetectionOptions
): ChangeDecision {
  if (!passesDateFilter(source, options)) return 'date_filtered'
  if (existingDestination && isUpToDate(source, existingDestination)) return 'up_to_date'
  return 'process'
}

export function shouldProcess(
  source: SourceItem,
  existingDestination: DestinationItem | null,
  runTodayOnly: boolean,
  timezone: string,
  now?: DateTime
): boolean {
  return evaluate(source, existingDestination, { runTodayOnly, timezone, now }) === 'process'
}
