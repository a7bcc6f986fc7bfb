/**
 * Checkpoint — a periodic commitment of L2 state posted to L1.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema, Hex32 } from "./address.js";

export const CheckpointV1 = Type.Object(
  {
    index: Type.Integer({ minimum: 0 }),
    submitter: AddressSchema,
    output_root: Hex32,
    /** L2 block the output root commits to. */
    block_number: Type.Integer({ minimum: 0 }),
    /** L1 time the checkpoint was accepted (s). */
    timestamp: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type CheckpointV1 = Static<typeof CheckpointV1>;
