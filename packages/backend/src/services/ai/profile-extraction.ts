import { z } from "zod";
import { complete_json } from "./openai.js";

// Scraped profiles can be large; the model only needs the top of it.
const MAX_PROFILE_CHARS = 12_000;

const SYSTEM_PROMPT = `You extract CRM fields from a scraped LinkedIn profile.
Respond with a JSON object with exactly these keys:
- "company": the current employer, or null
- "position": the current job title, or null
- "summary": one or two sentences describing the person professionally, or null
Use only information present in the profile.`;

const nullable_text = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

export const extracted_profile_schema = z.object({
  company: nullable_text,
  position: nullable_text,
  summary: nullable_text,
});

export type ExtractedProfile = z.output<typeof extracted_profile_schema>;

export async function extract_profile(profile: Record<string, unknown>): Promise<ExtractedProfile> {
  const serialized = JSON.stringify(profile).slice(0, MAX_PROFILE_CHARS);
  return complete_json(SYSTEM_PROMPT, serialized, extracted_profile_schema);
}
