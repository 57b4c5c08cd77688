export type PriceRejectReason = 'non_finite' | 'non_positive' | 'implausible_jump';

export type PriceDecision =
  | { accepted: true; price: number }
  | { accepted: false; reason: PriceRejectReason; price: number | null };

/**
 * Decides whether a candidate price can replace the last known good one.
 * On rejection `price` echoes the retained last-known value.
 */
export function validatePrice(candidate: number, lastKnown: number | null, maxJumpPct = 10): PriceDecision {
  if (!Number.isFinite(candidate)) {
    return { accepted: false, reason: 'non_finite', price: lastKnown };
  }
  if (candidate <= 0) {
    return { accepted: false, reason: 'non_positive', price: lastKnown };
  }
  if (lastKnown !== null && lastKnown > 0) {
    const jumpPct = (Math.abs(candidate - lastKnown) / lastKnown) * 100;
    if (jumpPct > maxJumpPct) {
      return { accepted: false, reason: 'implausible_jump', price: lastKnown };
    }
  }
  return { accepted: true, price: candidate };
}

function rejectTouch(bid: number, ask: number, lastMid: number | null): PriceDecision | null {
  for (const side of [bid, ask]) {
    const decision = validatePrice(side, null);
    if (!decision.accepted) return { ...decision, price: lastMid };
  }
  return null;
}

export interface Quote {
  bid: number;
  ask: number;
  mid: number;
  receivedAt: number;
}

export class PriceTracker {
  private current: Quote | null = null;
  private rejectedJumps = 0;

  constructor(private readonly maxJumpPct = 10) {}

  get latest(): Quote | null {
    return this.current;
  }

  /** Consecutive candidates refused as implausible jumps since the last accepted price. */
  get consecutiveJumpRejects() {
    return this.rejectedJumps;
  }

  /** Applies a bid/ask pair. Each side must be a positive finite price; the jump check runs on the mid. */
  update(bid: number, ask: number, receivedAt: number): PriceDecision {
    const lastMid = this.current?.mid ?? null;
    const touchRejection = rejectTouch(bid, ask, lastMid);
    if (touchRejection) return touchRejection;
    const mid = (bid + ask) / 2;
    const decision = validatePrice(mid, lastMid, this.maxJumpPct);
    if (decision.accepted) {
      this.current = { bid, ask, mid, receivedAt };
      this.rejectedJumps = 0;
    } else if (decision.reason === 'implausible_jump') {
      this.rejectedJumps += 1;
    }
    return decision;
  }

  /** Replaces the reference with an exchange-confirmed quote, bypassing the jump check. */
  reanchor(bid: number, ask: number, receivedAt: number) {
    if (rejectTouch(bid, ask, this.current?.mid ?? null)) return false;
    const mid = (bid + ask) / 2;
    this.current = { bid, ask, mid, receivedAt };
    this.rejectedJumps = 0;
    return true;
  }
}
