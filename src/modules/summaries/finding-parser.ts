import { z } from "zod";

const claimsSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const findingsResponseSchema = z.object({
  findings: z
    .array(
      z.object({
        id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
        claims: claimsSchema.optional(),
        claim: z.string().optional()
      })
    )
});

const LINE_PATTERN = /^\s*(?:[-*]\s*)?\[?(art_\d+)\]?\s*[:.)-]?\s+(.+)$/i;
const MAX_CLAIMS_PER_ARTICLE = 3;

export const cleanClaim = (value: string): string =>
  value
    .replace(/\s+/g, " ")
    .replace(/^["'\s]+|["'\s]+$/g, "")
    .trim();

const addClaims = (target: Map<string, string[]>, id: string, claims: string[]): void => {
  const key = id.toLowerCase();
  const existing = target.get(key) ?? [];
  for (const claim of claims.map(cleanClaim)) {
    if (claim && existing.length < MAX_CLAIMS_PER_ARTICLE && !existing.includes(claim)) {
      existing.push(claim);
    }
  }
  target.set(key, existing);
};

const parseJsonFindings = (content: string): Map<string, string[]> | null => {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end <= start) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(content.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = findingsResponseSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const claimsById = new Map<string, string[]>();
  for (const entry of parsed.data.findings) {
    addClaims(claimsById, entry.id, [...(entry.claims ?? []), ...(entry.claim ? [entry.claim] : [])]);
  }
  return claimsById;
};

const parseLineFindings = (content: string): Map<string, string[]> | null => {
  const claimsById = new Map<string, string[]>();
  for (const line of content.split(/\r?\n/)) {
    const match = LINE_PATTERN.exec(line);
    if (match?.[1] && match[2]) {
      addClaims(claimsById, match[1], [match[2]]);
    }
  }
  return claimsById.size > 0 ? claimsById : null;
};

/**
 * Reads model output into claims keyed by lower-cased prompt id. Accepts the
 * JSON contract first and falls back to `art_N: claim` lines. Returns `null`
 * when neither shape is present.
 */
export const parseFindingsResponse = (content: string): Map<string, string[]> | null => {
  if (!content.trim()) {
    return null;
  }
  return parseJsonFindings(content) ?? parseLineFindings(content);
};
