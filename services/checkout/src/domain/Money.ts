/**
 * Amounts are integer cents throughout. The gateway speaks whole shillings,
 * the HTTP API renders two-decimal strings.
 */
export const formatCents = (cents: number): string => {
  const sign = cents < 0 ? "-" : ""
  const abs = Math.abs(cents)
  const minor = String(abs % 100).padStart(2, "0")
  return `${sign}${Math.floor(abs / 100)}.${minor}`
}

// STK push only accepts whole units; fractional totals are rounded up
export const toChargeableUnits = (cents: number): number => Math.ceil(cents / 100)

export const unitsToCents = (amount: number): number => Math.round(amount * 100)
