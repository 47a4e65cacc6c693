import type { Modifier } from '../modifiers/modifier.js';

/**
 * Insertion-ordered modifier storage with identity semantics. Each add and
 * each effective remove calls the matching lifecycle hook exactly once.
 */
export class ModifierList {
  private readonly entries: Modifier[] = [];

  get items(): readonly Modifier[] {
    return this.entries;
  }

  add(modifier: Modifier): void {
    this.entries.push(modifier);
    modifier.activate();
  }

  remove(modifier: Modifier): boolean {
    if (!this.entries.includes(modifier)) {
      return false;
    }

    modifier.deactivate();
    const index = this.entries.indexOf(modifier);
    if (index !== -1) {
      this.entries.splice(index, 1);
    }
    return true;
  }

  has(modifier: Modifier): boolean {
    return this.entries.includes(modifier);
  }
}
