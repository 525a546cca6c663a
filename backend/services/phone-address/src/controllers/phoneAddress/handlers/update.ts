// backend/services/phone-address/src/controllers/phoneAddress/handlers/update.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { parseOrThrow, respond } from "@shared/contracts/common";
import type { PhoneAddressService } from "../../../services/phoneAddressService";
import {
  phoneAddressDto,
  phoneParamDto,
  updatePhoneAddressDto,
} from "./schemas";

/** PUT /phone-addresses/:phone → 200 updated record | 404 */
export function update(service: PhoneAddressService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { phone } = parseOrThrow(phoneParamDto, req.params);
    const { address } = parseOrThrow(updatePhoneAddressDto, req.body);
    req.log.debug({ phone }, "[phoneAddress.controller.update] enter");

    const updated = await service.updateRecord(phone, address);
    respond(res, phoneAddressDto, updated);
  });
}
