/**
 * DeclarationRegistry - arena of declaration identities
 *
 * Assigns a content-independent integer to each binding key the first time
 * it is seen and keeps the side table id -> Declaration. One registry is
 * shared by every tracker of a run, so ids are unique across strategies.
 *
 * First writer wins: a later intern() of a known key returns the existing
 * declaration untouched.
 */

import {
  brandDeclarationId,
  scopeOfKind,
  type Declaration,
  type DeclarationId,
  type DeclarationInput,
} from '@unread/types';

export interface InternResult {
  declaration: Declaration;
  /** false when the key was already known */
  created: boolean;
}

export class DeclarationRegistry {
  private nextId = 1;
  private readonly byKey = new Map<string, Declaration>();
  private readonly byId = new Map<DeclarationId, Declaration>();

  intern(input: DeclarationInput): InternResult {
    const existing = this.byKey.get(input.key);
    if (existing) {
      return { declaration: existing, created: false };
    }

    const declaration: Declaration = Object.freeze({
      id: brandDeclarationId(this.nextId++),
      key: input.key,
      name: input.name,
      kind: input.kind,
      scope: scopeOfKind(input.kind),
      location: Object.freeze({ ...input.location }),
      ...(input.siblingGroup !== undefined ? { siblingGroup: input.siblingGroup } : {}),
    });

    this.byKey.set(declaration.key, declaration);
    this.byId.set(declaration.id, declaration);
    return { declaration, created: true };
  }

  get(id: DeclarationId): Declaration | undefined {
    return this.byId.get(id);
  }

  getByKey(key: string): Declaration | undefined {
    return this.byKey.get(key);
  }

  get size(): number {
    return this.byId.size;
  }
}
