// backend/services/phone-address/src/controllers/phoneAddress/handlers/schemas.ts
/**
 * Localized schema imports for handlers.
 * (No export *; explicit named exports only.)
 */
export {
  createPhoneAddressDto,
  updatePhoneAddressDto,
  phoneParamDto,
  phoneAddressDto,
} from "../../../validators/phoneAddress.dto";
