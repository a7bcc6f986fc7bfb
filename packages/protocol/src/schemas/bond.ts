/**
 * Bond — stake locked against one checkpoint.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema, AmountString } from "./address.js";

/** Wire form of a bond (amount as decimal string). */
export const BondV1 = Type.Object(
  {
    checkpoint_index: Type.Integer({ minimum: 0 }),
    amount: AmountString,
    expires_at: Type.Integer({ minimum: 0 }),
    submitter: AddressSchema,
  },
  { additionalProperties: false },
);

export type BondV1 = Static<typeof BondV1>;
