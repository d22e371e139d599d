import { Type, type Static } from "@sinclair/typebox";

export const Uuid = Type.String({ format: "uuid" });

export const EntityName = Type.String({ minLength: 1, maxLength: 100 });

export const DimensionSchema = Type.Union([Type.Literal("boat"), Type.Literal("captain"), Type.Literal("program")], {
  $id: "Dimension",
});

export const PeriodCodeSchema = Type.Union(
  [
    Type.Literal("today"),
    Type.Literal("yesterday"),
    Type.Literal("week"),
    Type.Literal("month"),
    Type.Literal("this_month"),
    Type.Literal("3months"),
    Type.Literal("all"),
  ],
  { $id: "PeriodCode" },
);

export type Dimension = Static<typeof DimensionSchema>;
export type PeriodCode = Static<typeof PeriodCodeSchema>;
