// packages/donation/src/state-machine.ts
import type { DonationRecord } from "./types.js";

export type DonorState = "NO_DONATION" | "DONATED" | "VERIFIED";

export type DonorEventType = "DONATE" | "VERIFY";

export function transitionDonorState(current: DonorState, eventType: DonorEventType): DonorState {
  switch (current) {
    case "NO_DONATION": {
      if (eventType === "DONATE") return "DONATED";
      // verify without a donation is accepted against a zero-valued record
      return "VERIFIED";
    }

    case "DONATED": {
      if (eventType === "VERIFY") return "VERIFIED";
      return current;
    }

    case "VERIFIED": {
      // a new donation overwrites the record and clears `verified`
      if (eventType === "DONATE") return "DONATED";
      return current;
    }

    default:
      return current;
  }
}

export function donorStateOf(record: DonationRecord | null): DonorState {
  if (!record) return "NO_DONATION";
  return record.verified ? "VERIFIED" : "DONATED";
}
