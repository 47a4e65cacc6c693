import { StatValueBase } from './stat-value.js';

/** A bare reactive cell: every differing write is committed as is. */
export class PlainValue extends StatValueBase {
  readonly kind = 'plain' as const;

  constructor(amount: number) {
    super(amount);
  }

  setAmount(amount: number): void {
    this.commit(this, amount);
  }
}
