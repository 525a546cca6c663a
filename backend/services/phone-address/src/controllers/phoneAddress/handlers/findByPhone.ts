// backend/services/phone-address/src/controllers/phoneAddress/handlers/findByPhone.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { parseOrThrow, respond } from "@shared/contracts/common";
import type { PhoneAddressService } from "../../../services/phoneAddressService";
import { phoneAddressDto, phoneParamDto } from "./schemas";

/** GET /phone-addresses/:phone → 200 record | 404 */
export function findByPhone(service: PhoneAddressService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { phone } = parseOrThrow(phoneParamDto, req.params);
    req.log.debug({ phone }, "[phoneAddress.controller.findByPhone] enter");

    const record = await service.getRecord(phone);
    respond(res, phoneAddressDto, record);
  });
}
