// ESM + NodeNext: include .js on local imports
export {
  ConversationTurnSchema,
  InsightSchema,
  MappingValueSchema,
  TurnRoleEnum,
} from "./schemas.js";

export type { ConversationTurn, Insight, TurnRole } from "./schemas.js";

export { system as fillerSystem, turnMessage } from "./agents/filler.js";
export type { TurnInput } from "./agents/filler.js";

export { system as analystSystem, placeholderMessage } from "./agents/analyst.js";
