import { ImmutableWriteError } from '../errors.js';
import { StatValueBase } from './stat-value.js';

/**
 * A value locked after construction. The constructor performs the only
 * write it will ever accept.
 */
export class ConstantValue extends StatValueBase {
  readonly kind = 'locked' as const;

  constructor(amount: number) {
    super(amount);
  }

  setAmount(amount: number): never {
    throw new ImmutableWriteError(this.kind, amount, this.label);
  }
}
