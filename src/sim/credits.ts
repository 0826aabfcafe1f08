import type { CreditBatch } from '../engine/types';

// FIFO credit batches, oldest first. Both expiry and spending consume from the head.
export class CreditLedger {
  private batches: CreditBatch[] = [];

  add(step: number, amount: number) {
    if (amount <= 0) return;
    const last = this.batches[this.batches.length - 1];
    if (last && last.step > step) throw new RangeError(`batch for step ${step} after step ${last.step}`);
    this.batches.push({ step, amount });
  }

  // Drops batches older than maxAgeWeeks. Stops at the first batch still in date.
  expire(step: number, maxAgeWeeks: number): number {
    let expired = 0;
    while (this.batches.length > 0 && step - this.batches[0].step > maxAgeWeeks) {
      expired += this.batches[0].amount;
      this.batches.shift();
    }
    return expired;
  }

  // Takes up to `amount` from the oldest batches; returns what was actually taken.
  consume(amount: number): number {
    let left = amount;
    while (left > 0 && this.batches.length > 0) {
      const head = this.batches[0];
      if (head.amount <= left) {
        left -= head.amount;
        this.batches.shift();
      } else {
        head.amount -= left;
        left = 0;
      }
    }
    return amount - left;
  }

  snapshot(): CreditBatch[] {
    return this.batches.map((b) => ({ ...b }));
  }
}
