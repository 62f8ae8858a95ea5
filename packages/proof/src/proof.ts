// packages/proof/src/proof.ts
import { z } from "zod";

/** Raw proof bytes, as bytes or a 0x-prefixed even-length hex string. */
export type ProofData = Uint8Array | string;

const HexBytesSchema = z
  .string()
  .trim()
  .regex(/^0x(?:[0-9a-fA-F]{2})*$/, "Expected 0x-prefixed hex bytes")
  .transform((v) => new Uint8Array(Buffer.from(v.slice(2), "hex")));

export const ProofDataSchema = z.union([
  z.instanceof(Uint8Array).transform((b) => new Uint8Array(b)),
  HexBytesSchema,
]);

/** Bytes, or null when the input is not proof data at all. */
export function parseProofData(input: unknown): Uint8Array | null {
  const r = ProofDataSchema.safeParse(input);
  return r.success ? r.data : null;
}

/** Empty or all-zero proof: the "no proof" sentinel. */
export function isEmptyProof(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}
