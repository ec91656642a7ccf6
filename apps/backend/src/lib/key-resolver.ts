// apps/backend/src/lib/key-resolver.ts
// Maps keys echoed back by the model onto known placeholders by normalised
// substring containment. One candidate may hit several placeholders
// ("date" → "[Effective Date]" and "[Termination Date]"); all of them are returned.

function normalise(s: string): string {
  return s.toLowerCase().replace(/ /g, '')
}

export function resolveKey(candidate: string, placeholders: readonly string[]): string[] {
  const needle = normalise(candidate.trim())
  return placeholders.filter((p) => normalise(p).includes(needle))
}
