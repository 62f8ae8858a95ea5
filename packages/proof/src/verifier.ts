// packages/proof/src/verifier.ts
import { isZeroAddress, tryParseAddress } from "../../common/src/address.js";
import type { Logger } from "../../common/src/logger.js";
import { silentLogger } from "../../common/src/logger.js";
import type { ProofData } from "./proof.js";
import { isEmptyProof, parseProofData } from "./proof.js";

/**
 * Gate for the verified/invoice path.
 *
 * Contract for every implementation: malformed, empty or all-zero proofs and
 * zero or malformed claimants yield `false`. Never throw for bad input.
 */
export interface ProofVerifier {
  readonly kind: string;
  verify(proof: ProofData, claimant: string): Promise<boolean>;
}

/** True when both inputs carry something; no cryptography. */
export function isWellFormedClaim(proof: unknown, claimant: unknown): boolean {
  const bytes = parseProofData(proof);
  if (!bytes || isEmptyProof(bytes)) return false;

  const who = tryParseAddress(claimant);
  return who !== null && !isZeroAddress(who);
}

/**
 * Accepts any well-formed, non-zero proof from a non-zero claimant.
 * Stand-in until a real succinct proof check is plugged in.
 */
export class MockProofVerifier implements ProofVerifier {
  readonly kind = "mock:accept-non-empty";

  async verify(proof: ProofData, claimant: string): Promise<boolean> {
    return isWellFormedClaim(proof, claimant);
  }
}

/**
 * Holds any verifier to the never-throw contract: a throw or rejection is
 * logged and reported as `false`, and only a literal `true` passes.
 * Inputs that fail the shape check never reach the inner verifier.
 */
export function guardVerifier(inner: ProofVerifier, logger: Logger = silentLogger): ProofVerifier {
  return {
    kind: `guarded:${inner.kind}`,
    async verify(proof: ProofData, claimant: string): Promise<boolean> {
      if (!isWellFormedClaim(proof, claimant)) return false;
      try {
        return (await inner.verify(proof, claimant)) === true;
      } catch (e) {
        logger.warn("proof verifier threw; treating as rejected", {
          verifier: inner.kind,
          error: e instanceof Error ? e.message : String(e),
        });
        return false;
      }
    },
  };
}
