// backend/services/phone-address/src/validators/phoneAddress.dto.ts
import { z } from "zod";

/**
 * Phone is used as the storage key. Format is not validated beyond length;
 * "+", spaces and dashes are all allowed.
 */
export const zPhone = z
  .string({ required_error: "phone is required" })
  .min(3, "phone must contain at least 3 characters")
  .max(64, "phone must contain at most 64 characters");

export const zAddress = z
  .string({ required_error: "address is required" })
  .min(1, "address must not be empty")
  .max(1024, "address must contain at most 1024 characters");

/** POST /phone-addresses */
export const createPhoneAddressDto = z
  .object({
    phone: zPhone,
    address: zAddress,
  })
  .strip();

/** PUT /phone-addresses/:phone (only the address may change) */
export const updatePhoneAddressDto = z
  .object({
    address: zAddress,
  })
  .strip();

/**
 * PARAMS: /:phone
 * Any non-empty segment is a lookup key; one that was never stored is a 404,
 * so the body length rules do not apply here.
 */
export const phoneParamDto = z.object({
  phone: z.string().min(1, "phone must not be empty"),
});

/** Wire shape of a record (responses) */
export const phoneAddressDto = z.object({
  phone: z.string(),
  address: z.string(),
});

export type CreatePhoneAddressDto = z.infer<typeof createPhoneAddressDto>;
export type PhoneAddressRecord = z.infer<typeof phoneAddressDto>;
