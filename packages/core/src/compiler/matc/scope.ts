/**
 * Arena of lexical scopes
 *
 * Scopes are addressed by integer id and link to their parent by id, so the
 * typed tree can refer to a scope with a plain number.
 */

import type { Type } from "../../types/primitives.js";

export type ScopeId = number;

export interface ScopeRecord {
  id: ScopeId;
  parent?: ScopeId;
  symbols: Map<string, Type>;
}

export class ScopeTable {
  private readonly records: ScopeRecord[] = [];

  /** Outermost scope, holding the globals */
  readonly global: ScopeId;

  constructor() {
    this.global = this.create();
  }

  /** Create a scope nested in `parent` and return its id */
  create(parent?: ScopeId): ScopeId {
    const id = this.records.length;
    this.records.push(parent === undefined ? { id, symbols: new Map() } : { id, parent, symbols: new Map() });
    return id;
  }

  /** Declare a name in exactly this scope; false when it is already declared there */
  declare(scope: ScopeId, name: string, type: Type): boolean {
    const record = this.get(scope);
    if (record.symbols.has(name)) return false;
    record.symbols.set(name, type);
    return true;
  }

  /** Type of the innermost declaration of `name` visible from `scope` */
  lookup(scope: ScopeId, name: string): Type | undefined {
    const owner = this.resolve(scope, name);
    return owner === undefined ? undefined : this.get(owner).symbols.get(name);
  }

  /** Id of the innermost scope visible from `scope` that declares `name` */
  resolve(scope: ScopeId, name: string): ScopeId | undefined {
    for (let id: ScopeId | undefined = scope; id !== undefined; id = this.get(id).parent) {
      if (this.get(id).symbols.has(name)) return id;
    }
    return undefined;
  }

  parentOf(scope: ScopeId): ScopeId | undefined {
    return this.get(scope).parent;
  }

  get(scope: ScopeId): ScopeRecord {
    const record = this.records[scope];
    if (!record) {
      throw new RangeError(`Unknown scope ${scope}`);
    }
    return record;
  }

  get size(): number {
    return this.records.length;
  }
}
