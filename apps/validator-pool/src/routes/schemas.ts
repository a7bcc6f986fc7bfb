/**
 * Request schemas for the RPC routes.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressSchema, AmountString, Hex32 } from "@valpool/protocol";

export const AmountRequest = Type.Object(
  { address: AddressSchema, amount: AmountString },
  { additionalProperties: false },
);
export type AmountRequest = Static<typeof AmountRequest>;

export const AddressParams = Type.Object({ address: AddressSchema });
export type AddressParams = Static<typeof AddressParams>;

export const IndexParams = Type.Object({ index: Type.Integer({ minimum: 0 }) });
export type IndexParams = Static<typeof IndexParams>;

export const SubmitCheckpointRequest = Type.Object(
  {
    submitter: AddressSchema,
    output_root: Hex32,
    block_number: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);
export type SubmitCheckpointRequest = Static<typeof SubmitCheckpointRequest>;

export const IncreaseBondRequest = Type.Object(
  { caller: AddressSchema, challenger: AddressSchema },
  { additionalProperties: false },
);
export type IncreaseBondRequest = Static<typeof IncreaseBondRequest>;

export const EventsQuery = Type.Object({
  from: Type.Optional(Type.Integer({ minimum: 0 })),
  type: Type.Optional(Type.String()),
});
export type EventsQuery = Static<typeof EventsQuery>;
