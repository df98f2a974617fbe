import { IllegalStateError } from '../errors.ts';

/**
 * A value computed at most once, on first access.
 *
 * Reading the cell while its own initializer is still running throws: the
 * caller would otherwise observe a half-built value.
 */
export class Lazy<T> {
  private state:
    | { readonly kind: 'pending'; readonly init: () => T }
    | { readonly kind: 'running' }
    | { readonly kind: 'ready'; readonly value: T };

  constructor(init: () => T) {
    this.state = { kind: 'pending', init };
  }

  get(): T {
    switch (this.state.kind) {
      case 'ready':
        return this.state.value;
      case 'running':
        throw new IllegalStateError('Lazy value accessed during its own initialization');
      case 'pending': {
        const { init } = this.state;
        this.state = { kind: 'running' };
        try {
          const value = init();
          this.state = { kind: 'ready', value };
          return value;
        } catch (err) {
          this.state = { kind: 'pending', init };
          throw err;
        }
      }
    }
  }

  get initialized(): boolean {
    return this.state.kind === 'ready';
  }
}

export function lazy<T>(init: () => T): Lazy<T> {
  return new Lazy(init);
}
