import { type DefinitionOf, definePayload } from "@botwire/core";
import { z } from "zod";
import { UserSchema } from "../types/user";

export const GetMe = definePayload({
  method: "getMe",
  required: z.object({}),
  optional: {},
  output: UserSchema,
});

export type GetMeDefinition = DefinitionOf<typeof GetMe>;
