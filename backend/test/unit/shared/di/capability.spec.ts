import { describe, it, expect } from 'vitest';
import { defineCapability } from '../../../../src/shared/di';

interface Greeter {
  greet(name: string): string;
  farewell(name: string): string;
}

const GreeterCapability = defineCapability<Greeter>('Greeter', ['greet', 'farewell']);

class FullGreeter implements Greeter {
  greet(name: string) {
    return `hi ${name}`;
  }
  farewell(name: string) {
    return `bye ${name}`;
  }
}

class HalfGreeter {
  greet(name: string) {
    return `hi ${name}`;
  }
}

class InheritedGreeter extends FullGreeter {}

class ArrowGreeter {
  greet = (name: string) => `hi ${name}`;
  farewell = (name: string) => `bye ${name}`;
}

describe('defineCapability', () => {
  it('gives each capability a distinct identity even with the same name', () => {
    const other = defineCapability<Greeter>('Greeter', ['greet', 'farewell']);

    expect(other.id).not.toBe(GreeterCapability.id);
    expect(GreeterCapability.name).toBe('Greeter');
    expect(GreeterCapability.requiredMethods).toEqual(['greet', 'farewell']);
  });

  it('accepts classes whose prototype carries every required method', () => {
    expect(GreeterCapability.isSatisfiedBy(FullGreeter)).toBe(true);
    expect(GreeterCapability.isSatisfiedBy(InheritedGreeter)).toBe(true);
  });

  it('rejects classes missing a required method', () => {
    expect(GreeterCapability.isSatisfiedBy(HalfGreeter)).toBe(false);
  });

  it('does not see instance arrow properties on the prototype', () => {
    expect(GreeterCapability.isSatisfiedBy(ArrowGreeter)).toBe(false);
    // ...but a live instance still satisfies the contract
    expect(GreeterCapability.isImplementedBy(new ArrowGreeter())).toBe(true);
  });

  it('coerces live objects to the contract', () => {
    expect(GreeterCapability.isImplementedBy(new FullGreeter())).toBe(true);
    expect(GreeterCapability.isImplementedBy(new HalfGreeter())).toBe(false);
    expect(GreeterCapability.isImplementedBy(null)).toBe(false);
    expect(GreeterCapability.isImplementedBy('greet')).toBe(false);
  });
});
