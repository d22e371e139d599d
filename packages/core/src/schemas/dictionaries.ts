import { Type, type Static } from "@sinclair/typebox";

import { EntityName } from "./common.js";

export const DictionariesSchema = Type.Object(
  {
    captains: Type.Array(EntityName, { minItems: 1 }),
    boats: Type.Array(EntityName, { minItems: 1 }),
    programs: Type.Array(EntityName, { minItems: 1 }),
    piers: Type.Array(EntityName, { minItems: 1 }),
    privateTourProgram: Type.Optional(EntityName),
  },
  { $id: "Dictionaries", additionalProperties: false },
);

export type Dictionaries = Static<typeof DictionariesSchema>;

export type DictionaryCategory = "boat" | "captain" | "program" | "privateRoute" | "pier";
