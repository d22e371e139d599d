import { Type, type Static } from "@sinclair/typebox";

// A telegramId of 0 admits every user.
export const ALLOW_ALL_USER_ID = 0;

export const AllowedUserSchema = Type.Object(
  {
    telegramId: Type.Integer({ minimum: 0 }),
    name: Type.Optional(Type.String({ maxLength: 128 })),
  },
  { $id: "AllowedUser", additionalProperties: false },
);

export const AllowedUsersSchema = Type.Object(
  {
    users: Type.Array(AllowedUserSchema, { default: [] }),
  },
  { $id: "AllowedUsers", additionalProperties: false },
);

export type AllowedUser = Static<typeof AllowedUserSchema>;
export type AllowedUsers = Static<typeof AllowedUsersSchema>;
