import { z } from "zod";

/** Roles recorded in a session's conversation log */
export const TurnRoleEnum = z.enum(["user", "assistant"]);
export type TurnRole = z.infer<typeof TurnRoleEnum>;

export const ConversationTurnSchema = z.object({
  role: TurnRoleEnum,
  content: z.string(),
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

/**
 * One value inside a mapping fragment echoed back by the model.
 * Scalars are accepted and stringified; anything nested is not a value.
 */
export const MappingValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

/** Advisory reading of a single placeholder (analyst output) */
export const InsightSchema = z.object({
  description: z.string().trim().min(1),
  example: z
    .union([z.string(), z.number()])
    .transform((value) => String(value))
    .default(""),
});
export type Insight = z.infer<typeof InsightSchema>;
