// backend/services/phone-address/src/routes/phoneAddressRoutes.ts
import { Router } from "express";
import type { PhoneAddressService } from "../services/phoneAddressService";

// Direct handler imports (no barrels)
import { findByPhone } from "../controllers/phoneAddress/handlers/findByPhone";
import { create } from "../controllers/phoneAddress/handlers/create";
import { update } from "../controllers/phoneAddress/handlers/update";
import { remove } from "../controllers/phoneAddress/handlers/remove";

/**
 * Policy:
 * - Create = POST /      (phone comes from the body)
 * - Read   = GET /:phone
 * - Update = PUT /:phone (address only)
 * - Delete = DELETE /:phone
 */
export function createPhoneAddressRouter(service: PhoneAddressService): Router {
  const router = Router();

  // one-liners only, no logic here
  router.post("/", create(service));
  router.get("/:phone", findByPhone(service));
  router.put("/:phone", update(service));
  router.delete("/:phone", remove(service));

  return router;
}
