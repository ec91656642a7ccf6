// apps/backend/src/lib/models.ts
// Centralised model resolution so the server and the CLI share defaults.

const FALLBACK_MODEL = 'llama-3.3-70b-versatile'

export function resolveModel(...candidates: Array<string | undefined | null>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) {
      return candidate.trim()
    }
  }
  return FALLBACK_MODEL
}
