/**
 * Field-level differences between a stored row and the values an update
 * wrote. Only keys present in `newObj` are compared.
 *
 *   computeChanges({ name: 'Choir' }, { name: 'Youth Choir' })
 *   // { name: { old: 'Choir', new: 'Youth Choir' } }
 */
export function computeChanges(
  oldObj: Record<string, unknown>,
  newObj: Record<string, unknown>,
  ignoreFields: string[] = ['updatedAt', 'passwordHash'],
): Record<string, { old: unknown; new: unknown }> | undefined {
  const changes: Record<string, { old: unknown; new: unknown }> = {};

  for (const [key, newVal] of Object.entries(newObj)) {
    if (ignoreFields.includes(key) || newVal === undefined) continue;

    const oldVal = oldObj[key];
    if (JSON.stringify(oldVal) !== JSON.stringify(newVal)) {
      changes[key] = { old: oldVal ?? null, new: newVal };
    }
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}
