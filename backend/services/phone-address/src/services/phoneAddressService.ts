// backend/services/phone-address/src/services/phoneAddressService.ts
import { ConflictError, NotFoundError } from "@shared/http/errors";
import { logger } from "@shared/utils/logger";
import { normalizePhone } from "@shared/utils/normalizePhone";
import type { KeyValueStore } from "../repo/kvStore";
import type {
  CreatePhoneAddressDto,
  PhoneAddressRecord,
} from "../validators/phoneAddress.dto";

export const KEY_PREFIX = "phone_address:";

export const PHONE_NOT_FOUND = "Phone number not found.";
export const PHONE_EXISTS = "Phone number already exists.";

export type PhoneAddressServiceOptions = {
  /** Store keys use the digits of the phone only. */
  normalizeKeys?: boolean;
};

/**
 * Business rules for phone-address records.
 *
 * Every mutation checks existence first and then writes. The two calls are
 * not atomic: concurrent creates for one phone can both succeed.
 *
 * Outcomes other than success are thrown as NotFoundError / ConflictError;
 * store failures propagate unchanged (StoreUnavailableError).
 */
export class PhoneAddressService {
  private readonly normalizeKeys: boolean;

  constructor(
    private readonly store: KeyValueStore,
    opts: PhoneAddressServiceOptions = {}
  ) {
    this.normalizeKeys = opts.normalizeKeys ?? false;
  }

  keyFor(phone: string): string {
    return KEY_PREFIX + (this.normalizeKeys ? normalizePhone(phone) : phone);
  }

  async getRecord(phone: string): Promise<PhoneAddressRecord> {
    const address = await this.store.get(this.keyFor(phone));
    if (address === null) throw new NotFoundError(PHONE_NOT_FOUND);
    return { phone, address };
  }

  async createRecord(input: CreatePhoneAddressDto): Promise<PhoneAddressRecord> {
    const key = this.keyFor(input.phone);
    if (await this.store.exists(key)) throw new ConflictError(PHONE_EXISTS);

    await this.store.set(key, input.address);
    logger.debug({ key }, "[phoneAddressService.create] stored");
    return { phone: input.phone, address: input.address };
  }

  async updateRecord(
    phone: string,
    address: string
  ): Promise<PhoneAddressRecord> {
    const key = this.keyFor(phone);
    if (!(await this.store.exists(key))) throw new NotFoundError(PHONE_NOT_FOUND);

    await this.store.set(key, address);
    logger.debug({ key }, "[phoneAddressService.update] stored");
    return { phone, address };
  }

  async deleteRecord(phone: string): Promise<void> {
    const key = this.keyFor(phone);
    const removed = await this.store.delete(key);
    if (!removed) throw new NotFoundError(PHONE_NOT_FOUND);
    logger.debug({ key }, "[phoneAddressService.delete] removed");
  }
}
