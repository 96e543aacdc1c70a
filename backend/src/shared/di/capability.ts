/**
 * backend/src/shared/di/capability.ts
 *
 * WHY:
 * - TypeScript interfaces vanish at runtime, so a service contract needs a value
 *   to be used as a lookup key. A Capability is that value.
 * - It also carries the contract's method set, so a class can be checked against
 *   it before registration and a constructed object can be coerced to it after.
 *
 * HOW TO USE:
 *   export interface Greeter { greet(name: string): string }
 *   export const GreeterCapability = defineCapability<Greeter>('Greeter', ['greet']);
 *
 * RULES:
 * - Required methods must live on the prototype (class methods), not as
 *   instance arrow-function properties, or `isSatisfiedBy` will not see them.
 */

/** Any class (abstract or not) whose instances are T. */
export type ServiceClass<T> = abstract new (...args: never[]) => T;

export type MethodKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

export type Capability<T> = {
  readonly id: symbol;
  readonly name: string;
  readonly requiredMethods: readonly string[];

  /** True when the class prototype carries every required method. */
  isSatisfiedBy(type: ServiceClass<unknown>): boolean;

  /** Coerces a live object to the contract. */
  isImplementedBy(value: unknown): value is T;
};

function hasMethods(target: unknown, methods: readonly string[]): boolean {
  if (typeof target !== 'object' || target === null) return false;
  return methods.every((m) => typeof Reflect.get(target, m) === 'function');
}

export function defineCapability<T extends object>(
  name: string,
  requiredMethods: readonly MethodKeys<T>[],
): Capability<T> {
  const methods: readonly string[] = Object.freeze([...requiredMethods]);

  return Object.freeze({
    id: Symbol(name),
    name,
    requiredMethods: methods,

    isSatisfiedBy(type: ServiceClass<unknown>): boolean {
      const proto: unknown = type.prototype;
      return hasMethods(proto, methods);
    },

    isImplementedBy(value: unknown): value is T {
      return hasMethods(value, methods);
    },
  });
}
