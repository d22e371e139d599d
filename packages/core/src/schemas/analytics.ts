import { Type, type Static } from "@sinclair/typebox";

export const AggregateRowSchema = Type.Object(
  {
    key: Type.String(),
    totalLiters: Type.Number({ minimum: 0 }),
    reportCount: Type.Integer({ minimum: 0 }),
    averageLitersPerReport: Type.Number({ minimum: 0 }),
  },
  { $id: "AggregateRow", additionalProperties: false },
);

export type AggregateRow = Static<typeof AggregateRowSchema>;

export type DateRange = {
  // Inclusive.
  from?: Date;
  // Exclusive.
  to?: Date;
};
