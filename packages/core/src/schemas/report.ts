import { Type, type Static } from "@sinclair/typebox";

import { EntityName, Uuid } from "./common.js";

export const NewReportSchema = Type.Object(
  {
    boat: EntityName,
    captain: EntityName,
    program: EntityName,
    // Route label, set only when the program is the private-tour marker.
    privateRoute: Type.Union([EntityName, Type.Null()]),
    pier: EntityName,
    liters: Type.Number({ exclusiveMinimum: 0 }),
    odometerPhotoId: Type.Union([Type.String({ maxLength: 200 }), Type.Null()]),
    receiptPhotoId: Type.Union([Type.String({ maxLength: 200 }), Type.Null()]),
    userId: Type.String({ minLength: 1, maxLength: 32 }),
  },
  { $id: "NewReport", additionalProperties: false },
);

export const ReportSchema = Type.Composite(
  [
    Type.Object({
      id: Uuid,
      createdAt: Type.Date(),
    }),
    NewReportSchema,
  ],
  { $id: "Report", additionalProperties: false },
);

export type NewReport = Static<typeof NewReportSchema>;
export type Report = Static<typeof ReportSchema>;
