/**
 * Shared scalar schemas.
 */

import { Type } from "@sinclair/typebox";
import { ADDRESS_PATTERN } from "../constants.js";

/** 0x-prefixed 20-byte address, lower case. */
export const AddressSchema = Type.String({ pattern: ADDRESS_PATTERN });

/** Non-negative base-unit amount as a decimal string (JSON has no bigint). */
export const AmountString = Type.String({ pattern: "^[0-9]{1,78}$" });

export const Hex32 = Type.String({ pattern: "^0x[0-9a-f]{64}$" });
