import { Option, Schema } from "effect"

// Safaricom/Airtel subscriber numbers in international form
export const PhoneNumber = Schema.String.pipe(
  Schema.pattern(/^254[17]\d{8}$/, {
    message: () => "Phone number must be a Kenyan mobile number (2547XXXXXXXX or 2541XXXXXXXX)"
  }),
  Schema.brand("PhoneNumber")
)
export type PhoneNumber = typeof PhoneNumber.Type

const decodePhone = Schema.decodeUnknownOption(PhoneNumber)

/**
 * Accepts `+254 712 345 678`, `254712345678`, `0712345678` and `712345678`.
 */
export const normalizePhoneNumber = (input: string): Option.Option<PhoneNumber> => {
  const digits = input.replace(/\D/g, "")

  if (digits.startsWith("0") && digits.length === 10) {
    return decodePhone(`254${digits.slice(1)}`)
  }
  if (digits.length === 9) {
    return decodePhone(`254${digits}`)
  }
  return decodePhone(digits)
}
