/**
 * Registry Types
 */

import type { Address } from "@concord/types";

/**
 * A registered item.
 *
 * `submitter`, `uri`, `category` and `createdAt` never change after
 * registration. Records are replaced, never mutated in place.
 */
export interface RegistryItem {
  readonly id: number;
  readonly submitter: Address;
  /** Non-empty content locator (e.g. "ipfs://…") */
  readonly uri: string;
  readonly category: string;
  /** Unix seconds */
  readonly createdAt: number;
  readonly isVerified: boolean;
  readonly isActive: boolean;
}
