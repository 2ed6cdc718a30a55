export type SelectStrategyName = 'value' | 'value_normalized' | 'label' | 'label_normalized';

export interface SelectStrategy {
  name: SelectStrategyName;
  option: string | { label: string };
}

/**
 * Maps ASCII punctuation to the typographic glyphs option lists tend to use:
 * apostrophes to U+2019, paired double quotes to U+201C/U+201D, and a spaced
 * hyphen to an en dash.
 */
export function normalizePunctuation(value: string): string {
  return value
    .replace(/'/g, '’')
    .replace(/"([^"]*)"/g, '“$1”')
    .replace(/ - /g, ' – ');
}

function sameOption(a: SelectStrategy['option'], b: SelectStrategy['option']): boolean {
  if (typeof a === 'string' || typeof b === 'string') return a === b;
  return a.label === b.label;
}

function dedupe(strategies: SelectStrategy[]): SelectStrategy[] {
  return strategies.filter(
    (strategy, index) => !strategies.slice(0, index).some((earlier) => sameOption(earlier.option, strategy.option)),
  );
}

/**
 * Ordered strategies for a top-level select field: value, normalized value,
 * visible label, normalized label.
 */
export function selectStrategies(value: string): SelectStrategy[] {
  const normalized = normalizePunctuation(value);
  return dedupe([
    { name: 'value', option: value },
    { name: 'value_normalized', option: normalized },
    { name: 'label', option: { label: value } },
    { name: 'label_normalized', option: { label: normalized } },
  ]);
}

/**
 * Group sub-fields only try the value as given, then normalized.
 */
export function subFieldSelectStrategies(value: string): SelectStrategy[] {
  return dedupe([
    { name: 'value', option: value },
    { name: 'value_normalized', option: normalizePunctuation(value) },
  ]);
}
