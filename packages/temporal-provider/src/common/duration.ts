import Long from 'long'

export const SECONDS_PER_DAY = 86_400

type Int64 = number | Long | null | undefined

/** Structural view of `google.protobuf.IDuration`; `seconds` may arrive as a Long. */
export interface DurationLike {
  readonly seconds?: Int64
  readonly nanos?: number | null
}

export interface RetentionDays {
  readonly days: number
  /** Seconds dropped when truncating to whole days. */
  readonly residualSeconds: number
}

const int64ToNumber = (value: Int64): number => {
  if (value == null) return 0
  if (typeof value === 'number') return value
  return value.toNumber()
}

export const daysToDuration = (days: number) => ({
  seconds: Long.fromNumber(days * SECONDS_PER_DAY),
  nanos: 0,
})

export const durationToDays = (duration: DurationLike | null | undefined): RetentionDays => {
  if (!duration) {
    return { days: 0, residualSeconds: 0 }
  }
  const seconds = int64ToNumber(duration.seconds)
  const days = Math.trunc(seconds / SECONDS_PER_DAY)
  return { days, residualSeconds: seconds - days * SECONDS_PER_DAY }
}
