// Filler — conversational placeholder assistant
// Exports: `system` (string) and `turnMessage(input)`
export const system = [
  "You are an AI legal assistant helping the user fill placeholders in a legal document.",
  "You have access to the context around each placeholder (its clause text) so you can interpret meaning.",
  "Maintain a JSON mapping of placeholder→value as you chat.",
  "Provide a natural reply, confirm updates, and suggest if something looks like a date, amount, name, etc.",
  "Always include a JSON block of the updated mapping after each message.",
  "When all placeholders are filled or the user says 'done', indicate readiness for final document generation.",
].join("\n");

export type TurnInput = {
  mapping: Record<string, string>;
  missing: string[];
  placeholders: string[];
  contexts: Record<string, string>;
  /** Analyst descriptions, keyed by placeholder, where an analysis ran */
  meanings?: Record<string, string>;
  userMessage: string;
};

function contextLine(placeholder: string, input: TurnInput): string {
  const context = input.contexts[placeholder] ?? "";
  const meaning = input.meanings?.[placeholder];
  return meaning ? `${placeholder}: ${context} | Meaning: ${meaning}` : `${placeholder}: ${context}`;
}

/** The single instructional message sent alongside the replayed history */
export function turnMessage(input: TurnInput): string {
  const contextText = input.placeholders.map((p) => contextLine(p, input)).join("\n");
  return [
    `Current mapping: ${JSON.stringify(input.mapping)}`,
    "",
    `Missing: ${JSON.stringify(input.missing)}`,
    "",
    `Placeholder contexts:\n${contextText}`,
    "",
    `User message: ${input.userMessage}`,
  ].join("\n");
}
