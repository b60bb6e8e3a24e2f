/**
 * Maps with named accessors
 *
 * `namedBidiMap("CountryCapitals", "country", "capital", BidiMap)` makes a
 * factory whose maps expose `capitalFor` (country → capital, the map itself)
 * and `countryFor` (capital → country, its inverse). The accessors are plain
 * aliases; nothing in the engine knows about them.
 */

import type { BidiMapBase } from "./base.js";
import { BidiMap } from "./bidimap.js";
import { ValidationError } from "./errors.js";
import { FrozenBidiMap, FrozenOrderedBidiMap } from "./frozen.js";
import { OrderedBidiMap } from "./ordered.js";
import type { BidiMapOptions, Defined, PairSource } from "./types.js";
import { validateIdentifier } from "./validation.js";

export type NamedBase =
  | typeof BidiMap
  | typeof OrderedBidiMap
  | typeof FrozenBidiMap
  | typeof FrozenOrderedBidiMap;

/**
 * Instance type of a base class for the given key and value types
 */
export type Instance<B extends NamedBase, K extends Defined, V extends Defined> =
  B extends typeof FrozenOrderedBidiMap
    ? FrozenOrderedBidiMap<K, V>
    : B extends typeof FrozenBidiMap
      ? FrozenBidiMap<K, V>
      : B extends typeof OrderedBidiMap
        ? OrderedBidiMap<K, V>
        : BidiMap<K, V>;

export type NamedAccessors<KN extends string, VN extends string, Forward, Backward> = {
  readonly [P in `${VN}For`]: Forward;
} & {
  readonly [P in `${KN}For`]: Backward;
};

export type Named<
  B extends NamedBase,
  K extends Defined,
  V extends Defined,
  KN extends string,
  VN extends string,
> = Instance<B, K, V> & NamedAccessors<KN, VN, Instance<B, K, V>, Instance<B, V, K>>;

export interface NamedBidiMapType<B extends NamedBase, KN extends string, VN extends string> {
  readonly typeName: string;
  readonly keyName: KN;
  readonly valueName: VN;
  readonly base: B;
  create<K extends Defined, V extends Defined>(
    init?: PairSource<K, V> | null,
    options?: BidiMapOptions
  ): Named<B, K, V, KN, VN>;
}

function construct<K extends Defined, V extends Defined>(
  base: NamedBase,
  init: PairSource<K, V> | null | undefined,
  options: BidiMapOptions
): BidiMapBase<K, V> {
  switch (base) {
    case FrozenOrderedBidiMap:
      return new FrozenOrderedBidiMap<K, V>(init, options);
    case FrozenBidiMap:
      return new FrozenBidiMap<K, V>(init, options);
    case OrderedBidiMap:
      return new OrderedBidiMap<K, V>(init, options);
    default:
      return new BidiMap<K, V>(init, options);
  }
}

function isInstance<B extends NamedBase, K extends Defined, V extends Defined>(
  map: BidiMapBase<K, V>,
  base: B
): map is Instance<B, K, V> & BidiMapBase<K, V> {
  return map instanceof base;
}

function hasAccessors<M extends object, KN extends string, VN extends string, F, I>(
  map: M,
  keyName: KN,
  valueName: VN
): map is M & NamedAccessors<KN, VN, F, I> {
  return `${keyName}For` in map && `${valueName}For` in map;
}

function defineAlias(target: object, name: string, resolve: () => object): void {
  Object.defineProperty(target, name, { get: resolve, enumerable: false, configurable: false });
}

/**
 * Make a factory for maps with `${valueName}For` and `${keyName}For` accessors
 *
 * @param typeName - Display name of the created maps
 * @throws ValidationError if a name is not an identifier, the two names are
 *   equal, or an accessor would shadow a member of `base`
 */
export function namedBidiMap<B extends NamedBase, KN extends string, VN extends string>(
  typeName: string,
  keyName: KN,
  valueName: VN,
  base: B
): NamedBidiMapType<B, KN, VN> {
  validateIdentifier(typeName, "type name");
  validateIdentifier(keyName, "key name");
  validateIdentifier(valueName, "value name");
  const keyNameText: string = keyName;
  if (keyNameText === valueName) {
    throw new ValidationError(`Key name and value name must differ, both are "${keyName}"`);
  }

  const forwardName = `${valueName}For`;
  const backwardName = `${keyName}For`;
  for (const name of [forwardName, backwardName]) {
    if (name in base.prototype) {
      throw new ValidationError(`Accessor "${name}" would shadow a member of ${base.name}`);
    }
  }

  return {
    typeName,
    keyName,
    valueName,
    base,
    create<K extends Defined, V extends Defined>(
      init?: PairSource<K, V> | null,
      options: BidiMapOptions = {}
    ): Named<B, K, V, KN, VN> {
      const map = construct(base, init, { ...options, name: options.name ?? typeName });
      if (!isInstance(map, base)) {
        throw new ValidationError(`Unsupported base class ${base.name}`);
      }

      const inverse = map.inverse;
      for (const target of [map, inverse]) {
        defineAlias(target, forwardName, () => map);
        defineAlias(target, backwardName, () => inverse);
      }

      if (!hasAccessors<typeof map, KN, VN, Instance<B, K, V>, Instance<B, V, K>>(map, keyName, valueName)) {
        throw new ValidationError(`Accessors missing on ${typeName}`);
      }
      return map;
    },
  };
}
