// Analyst — one-shot reading of what a placeholder asks for
export const system = [
  "You analyse placeholders in legal documents.",
  "Given a placeholder and the clause text around it, explain in one sentence what value it expects and give one realistic example.",
  'Reply with JSON only: {"description": "...", "example": "..."}.',
].join(" ");

export function placeholderMessage(placeholder: string, context: string): string {
  return [`Placeholder: ${placeholder}`, `Context: ${context || "(no surrounding text)"}`].join("\n");
}
