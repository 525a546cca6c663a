// backend/services/phone-address/src/controllers/phoneAddress/handlers/remove.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { parseOrThrow } from "@shared/contracts/common";
import type { PhoneAddressService } from "../../../services/phoneAddressService";
import { phoneParamDto } from "./schemas";

/** DELETE /phone-addresses/:phone → 204 (empty body) | 404 */
export function remove(service: PhoneAddressService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const { phone } = parseOrThrow(phoneParamDto, req.params);
    req.log.debug({ phone }, "[phoneAddress.controller.remove] enter");

    await service.deleteRecord(phone);
    res.status(204).send();
  });
}
