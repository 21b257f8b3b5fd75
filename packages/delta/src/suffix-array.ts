/**
 * Suffix array by prefix doubling with counting sorts, O(n log n)
 */

export function buildSuffixArray(data: Uint8Array): Int32Array {
  const n = data.length;
  const sa = new Int32Array(n);
  if (n === 0) return sa;

  let rank = new Int32Array(n);
  let next = new Int32Array(n);
  const order = new Int32Array(n);
  const counts = new Int32Array(Math.max(256, n));

  for (let i = 0; i < n; i++) counts[data[i]]++;
  for (let c = 1; c < 256; c++) counts[c] += counts[c - 1];
  for (let i = n - 1; i >= 0; i--) sa[--counts[data[i]]] = i;

  let classes = 1;
  rank[sa[0]] = 0;
  for (let i = 1; i < n; i++) {
    if (data[sa[i]] !== data[sa[i - 1]]) classes++;
    rank[sa[i]] = classes - 1;
  }

  for (let k = 1; classes < n; k <<= 1) {
    // Order by the second half first: suffixes shorter than k have an empty one
    let p = 0;
    for (let i = n - k; i < n; i++) order[p++] = i;
    for (let i = 0; i < n; i++) {
      if (sa[i] >= k) order[p++] = sa[i] - k;
    }

    counts.fill(0, 0, classes);
    for (let i = 0; i < n; i++) counts[rank[i]]++;
    for (let c = 1; c < classes; c++) counts[c] += counts[c - 1];
    for (let i = n - 1; i >= 0; i--) {
      const suffix = order[i];
      sa[--counts[rank[suffix]]] = suffix;
    }

    next[sa[0]] = 0;
    classes = 1;
    for (let i = 1; i < n; i++) {
      const a = sa[i - 1];
      const b = sa[i];
      const secondA = a + k < n ? rank[a + k] : -1;
      const secondB = b + k < n ? rank[b + k] : -1;
      if (rank[a] !== rank[b] || secondA !== secondB) classes++;
      next[b] = classes - 1;
    }
    [rank, next] = [next, rank];
  }

  return sa;
}
