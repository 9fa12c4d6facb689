import { DateTime } from "effect"

const pad = (value: number, width = 2) => String(value).padStart(width, "0")

// YYYYMMDDHHMMSS as used in order numbers and gateway passwords
export const compactTimestamp = (at: DateTime.DateTime): string => {
  const date = DateTime.toDate(at)
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds())
  ].join("")
}

// The gateway expects wall-clock time in East Africa Time (UTC+3, no DST)
export const toEastAfricaTime = (at: DateTime.Utc): DateTime.DateTime =>
  DateTime.add(at, { hours: 3 })
