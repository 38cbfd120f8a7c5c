/**
 * Splits a sample budget across strata.
 *
 * Every stratum first receives `minPerStratum` (or its whole capacity when
 * smaller), the rest of the budget goes out in proportion to the capacity
 * left over, and the units lost to rounding are handed out one at a time to
 * the strata with the most headroom. When the budget cannot cover the
 * minimum everywhere the split is even, with the remainder going to the
 * largest strata first.
 *
 * Quotas never exceed capacity and never sum past `total`.
 */
export function allocateQuotas<K>(
  total: number,
  capacities: ReadonlyMap<K, number>,
  minPerStratum = 1
): Map<K, number> {
  if (capacities.size === 0 || total <= 0) {
    return new Map([...capacities.keys()].map((key): [K, number] => [key, 0]));
  }

  const caps = new Map([...capacities].filter(([, capacity]) => capacity > 0));
  const keys = [...caps.keys()];
  if (keys.length === 0) {
    return new Map();
  }

  const capacityOf = (key: K): number => caps.get(key) ?? 0;

  if (total < keys.length * minPerStratum) {
    return allocateEvenly(total, keys, capacityOf);
  }

  const alloc = new Map(keys.map((key): [K, number] => [key, Math.min(minPerStratum, capacityOf(key))]));
  const remaining = total - sumValues(alloc);
  if (remaining <= 0) {
    return alloc;
  }

  const remainingCapacity = new Map(
    keys.map((key): [K, number] => [key, capacityOf(key) - (alloc.get(key) ?? 0)])
  );
  const remainingTotal = [...remainingCapacity.values()].reduce((sum, value) => sum + Math.max(value, 0), 0);
  if (remainingTotal <= 0) {
    return alloc;
  }

  const extra = new Map<K, number>();
  for (const key of keys) {
    const capRem = remainingCapacity.get(key) ?? 0;
    if (capRem <= 0) {
      extra.set(key, 0);
      continue;
    }
    extra.set(key, Math.min(Math.floor((remaining * capRem) / remainingTotal), capRem));
  }

  let leftover = remaining - sumValues(extra);
  if (leftover > 0) {
    const headroom = (key: K): number => (remainingCapacity.get(key) ?? 0) - (extra.get(key) ?? 0);
    const order = [...keys].sort((a, b) => headroom(b) - headroom(a));
    for (let i = 0; leftover > 0 && i < order.length * 2; i++) {
      const key = order[i % order.length];
      const current = extra.get(key) ?? 0;
      if (current < (remainingCapacity.get(key) ?? 0)) {
        extra.set(key, current + 1);
        leftover -= 1;
      }
    }
  }

  for (const key of keys) {
    alloc.set(key, (alloc.get(key) ?? 0) + (extra.get(key) ?? 0));
  }
  return alloc;
}

function allocateEvenly<K>(total: number, keys: K[], capacityOf: (key: K) => number): Map<K, number> {
  const base = Math.floor(total / keys.length);
  const alloc = new Map(keys.map((key): [K, number] => [key, Math.min(base, capacityOf(key))]));

  // Array.prototype.sort is stable, so equal capacities keep their input order.
  const order = [...keys].sort((a, b) => capacityOf(b) - capacityOf(a));
  let allocated = sumValues(alloc);
  for (let i = 0; allocated < total && i < order.length * 2; i++) {
    const key = order[i % order.length];
    const current = alloc.get(key) ?? 0;
    if (current < capacityOf(key)) {
      alloc.set(key, current + 1);
      allocated += 1;
    }
  }
  return alloc;
}

function sumValues<K>(map: ReadonlyMap<K, number>): number {
  let sum = 0;
  for (const value of map.values()) {
    sum += value;
  }
  return sum;
}
