/**
 * Join action names the way a narrator would say them:
 * "attack", "attack or flee", "attack, cast a spell, or flee".
 */
export function formatActionList(actions: readonly string[]): string {
  const names = actions.map((a) => a.trim()).filter((a) => a !== '');
  if (names.length === 0) return 'act';
  if (names.length === 1) return names[0];
  if (names.length === 2) return `${names[0]} or ${names[1]}`;
  return `${names.slice(0, -1).join(', ')}, or ${names[names.length - 1]}`;
}

/**
 * Effect phrase for a numeric spell outcome. Negative amounts are healing.
 */
export function describeSpellEffect(amount: number): string {
  if (amount > 0) return `dealing ${amount} damage`;
  if (amount < 0) return `healing for ${-amount} HP`;
  return 'with magical energy';
}
