// packages/donation/src/charity.ts
import fs from "node:fs";
import { z } from "zod";
import { DonationError } from "../../common/src/errors.js";

const ISO8601 = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp");

export const CharityDescriptorSchema = z.object({
  link: z.string().min(1),
  registeredAt: ISO8601,
  name: z.string().min(1),
  foundation: z.string().min(1),
  source: z.string().min(1),
  // smallest units, decimal string
  suggestedPrice: z.string().regex(/^\d+$/, "Must be decimal digits"),
  imageLocator: z.string().min(1),
});

export type CharityDescriptor = Readonly<z.infer<typeof CharityDescriptorSchema>>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export function parseCharityDescriptor(input: unknown): CharityDescriptor {
  const r = CharityDescriptorSchema.safeParse(input);
  if (!r.success) {
    throw new DonationError("INVALID_CONFIG", `charity descriptor invalid: ${describeIssues(r.error)}`);
  }
  return Object.freeze(r.data);
}

export function loadCharityDescriptor(filePath: string): CharityDescriptor {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new DonationError("INVALID_CONFIG", `charity descriptor not readable: ${filePath}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new DonationError("INVALID_CONFIG", `charity descriptor is not valid JSON: ${filePath}`, { cause: e });
  }
  return parseCharityDescriptor(json);
}
