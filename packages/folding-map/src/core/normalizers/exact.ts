export function exact<K>(key: K): K {
  return key
}
