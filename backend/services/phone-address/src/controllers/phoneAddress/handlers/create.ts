// backend/services/phone-address/src/controllers/phoneAddress/handlers/create.ts
import type { RequestHandler } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { parseOrThrow, respond } from "@shared/contracts/common";
import type { PhoneAddressService } from "../../../services/phoneAddressService";
import { createPhoneAddressDto, phoneAddressDto } from "./schemas";

/**
 * POST /phone-addresses → 201 record | 409 when the phone is already stored.
 * The body is validated before the service is called (422 otherwise).
 */
export function create(service: PhoneAddressService): RequestHandler {
  return asyncHandler(async (req, res) => {
    const dto = parseOrThrow(createPhoneAddressDto, req.body);
    req.log.debug({ phone: dto.phone }, "[phoneAddress.controller.create] enter");

    const created = await service.createRecord(dto);
    res.location(`${req.baseUrl}/${encodeURIComponent(created.phone)}`);
    respond(res, phoneAddressDto, created, 201);
  });
}
