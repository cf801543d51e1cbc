/**
 * Reminder Thresholds
 *
 * The fixed lead times before an event at which the media chat is reminded,
 * ordered by decreasing lead time.
 */

export type ThresholdKind = '24h' | '3h' | '1h' | '30min' | '10min'

export type Threshold = {
  readonly kind: ThresholdKind
  readonly minutesBefore: number
  /** Human-readable lead time used in messages */
  readonly label: string
}

export const THRESHOLDS: readonly Threshold[] = [
  { kind: '24h', minutesBefore: 1440, label: '1 day' },
  { kind: '3h', minutesBefore: 180, label: '3 hours' },
  { kind: '1h', minutesBefore: 60, label: '1 hour' },
  { kind: '30min', minutesBefore: 30, label: '30 minutes' },
  { kind: '10min', minutesBefore: 10, label: '10 minutes' },
]

export const THRESHOLD_KINDS: readonly ThresholdKind[] = THRESHOLDS.map((t) => t.kind)

export function isThresholdKind(value: string): value is ThresholdKind {
  return THRESHOLDS.some((t) => t.kind === value)
}

export function getThreshold(kind: ThresholdKind): Threshold {
  const found = THRESHOLDS.find((t) => t.kind === kind)
  if (!found) throw new RangeError(`Unknown threshold: ${kind}`)
  return found
}
