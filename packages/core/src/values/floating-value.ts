import type { Modifier } from '../modifiers/modifier.js';
import { ConstraintChainValue } from './constraint-chain.js';
import { ModifierList } from './modifier-list.js';

/**
 * A constrained cell that also holds modifiers. Its amount is driven from
 * outside (ticking modifiers, game logic); the modifiers it holds do not
 * derive it.
 */
export class FloatingValue extends ConstraintChainValue {
  readonly kind = 'modifiable' as const;

  private readonly modifierList = new ModifierList();

  constructor(amount: number) {
    super(amount);
  }

  get modifiers(): readonly Modifier[] {
    return this.modifierList.items;
  }

  setAmount(amount: number): void {
    this.commit(this, this.applyConstraints(amount));
  }

  recalculateAmount(): void {
    this.setAmount(this.amount);
  }

  /** Appends the modifier and activates it. Does not recalculate. */
  addModifier(modifier: Modifier): void {
    this.modifierList.add(modifier);
  }

  /** Deactivates and removes the modifier; absent modifiers are ignored. */
  removeModifier(modifier: Modifier): void {
    this.modifierList.remove(modifier);
  }

  hasModifier(modifier: Modifier): boolean {
    return this.modifierList.has(modifier);
  }
}
