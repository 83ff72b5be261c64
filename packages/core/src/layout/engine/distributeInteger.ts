/**
 * Distribute an integer total across weighted slots.
 *
 * - Each slot gets floor(total * weight / totalWeight).
 * - The cells lost to flooring all go to the last slot with a positive weight.
 * - Non-finite or non-positive weights receive 0.
 */
export function distributeInteger(total: number, weights: readonly number[]): number[] {
  const slotCount = weights.length;
  const out = new Array<number>(slotCount).fill(0);
  if (slotCount === 0) return out;

  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  if (target <= 0) return out;

  const normalizedWeights = new Array<number>(slotCount).fill(0);
  let totalWeight = 0;
  let lastWeighted = -1;
  for (let i = 0; i < slotCount; i++) {
    const raw = weights[i];
    const w = typeof raw === "number" && Number.isFinite(raw) && raw > 0 ? raw : 0;
    normalizedWeights[i] = w;
    totalWeight += w;
    if (w > 0) lastWeighted = i;
  }
  if (totalWeight <= 0 || lastWeighted < 0) return out;

  let assigned = 0;
  for (let i = 0; i < slotCount; i++) {
    const w = normalizedWeights[i] ?? 0;
    if (w <= 0) continue;
    const share = Math.floor((target * w) / totalWeight);
    out[i] = share;
    assigned += share;
  }

  out[lastWeighted] = (out[lastWeighted] ?? 0) + (target - assigned);
  return out;
}
