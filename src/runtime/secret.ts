/**
 * Secret value wrappers produced by `password` fields. The wrapped value is
 * only reachable through getSecretValue(); every display path is redacted.
 */

import { inspect } from "node:util";

const MASK = "**********";

abstract class Secret<T> {
  readonly #value: T;

  constructor(value: T) {
    this.#value = value;
  }

  getSecretValue(): T {
    return this.#value;
  }

  toString(): string {
    return MASK;
  }

  toJSON(): string {
    return MASK;
  }

  [inspect.custom](): string {
    return `${this.constructor.name}('${MASK}')`;
  }
}

export class SecretString extends Secret<string> {}

export class SecretBytes extends Secret<Buffer> {
  /** Byte length of the secret; safe to display */
  get length(): number {
    return this.getSecretValue().length;
  }
}
