interface AbstractMap<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): void;
}

// Only `undefined` counts as a miss, so cached `null` and `false` results stick.
export function getOrCreate<K, V>(map: AbstractMap<K, V>, key: K, construct: (key: K) => V): V {
  let result = map.get(key);
  if (result === undefined) {
    result = construct(key);
    map.set(key, result);
  }
  return result;
}
