/**
 * Form controls that report every change through a callback.
 * @module ui/widgets
 */

import { el } from './dom.js';

let widgetSeq = 0;

function nextId(prefix: string): string {
  widgetSeq += 1;
  return `${prefix}-${widgetSeq}`;
}

export interface MultiSelectOptions<T extends string> {
  label: string;
  options: readonly T[];
  selected: readonly T[];
  onChange: (selected: T[]) => void;
}

/**
 * Checkbox group. The reported selection keeps option order, not click order.
 */
export function multiSelect<T extends string>({ label, options, selected, onChange }: MultiSelectOptions<T>): HTMLFieldSetElement {
  const fieldset = el('fieldset', { class: 'widget widget--multi' }, el('legend', {}, label));
  const chosen = new Set<T>(selected);
  const boxes: Array<[T, HTMLInputElement]> = [];

  for (const option of options) {
    const id = nextId('opt');
    const input = el('input', { type: 'checkbox', id, value: option });
    input.checked = chosen.has(option);
    input.addEventListener('change', () => {
      onChange(boxes.filter(([, box]) => box.checked).map(([value]) => value));
    });
    boxes.push([option, input]);
    fieldset.appendChild(el('label', { class: 'widget__option', for: id }, input, ` ${option}`));
  }
  return fieldset;
}

export interface RangeSliderOptions {
  label: string;
  min: number;
  max: number;
  step?: number;
  value: readonly [number, number];
  onChange: (value: [number, number]) => void;
}

/**
 * Two range inputs for a closed interval. The handles can't cross; moving one
 * past the other drags it along.
 */
export function rangeSlider({ label, min, max, step = 1, value, onChange }: RangeSliderOptions): HTMLFieldSetElement {
  const output = el('output', { class: 'widget__value' });
  const attrs = { type: 'range', min: String(min), max: String(max), step: String(step) };
  const low = el('input', { ...attrs, 'aria-label': `${label} from`, 'data-handle': 'low' });
  const high = el('input', { ...attrs, 'aria-label': `${label} to`, 'data-handle': 'high' });
  low.value = String(value[0]);
  high.value = String(value[1]);

  const sync = () => {
    output.textContent = `${low.value} – ${high.value}`;
  };

  const handle = (moved: 'low' | 'high') => () => {
    let lo = Number(low.value);
    let hi = Number(high.value);
    if (lo > hi) {
      if (moved === 'low') hi = lo;
      else lo = hi;
      low.value = String(lo);
      high.value = String(hi);
    }
    sync();
    onChange([lo, hi]);
  };

  low.addEventListener('input', handle('low'));
  high.addEventListener('input', handle('high'));
  sync();

  return el('fieldset', { class: 'widget widget--range' },
    el('legend', {}, label),
    low,
    high,
    output
  );
}

export interface SelectBoxOptions<T extends string> {
  label: string;
  options: readonly T[];
  value: T;
  onChange: (value: T) => void;
}

export function selectBox<T extends string>({ label, options, value, onChange }: SelectBoxOptions<T>): HTMLLabelElement {
  const select = el('select');
  for (const option of options) {
    const node = el('option', { value: option }, option);
    node.selected = option === value;
    select.appendChild(node);
  }
  select.addEventListener('change', () => {
    const next = options.find((option) => option === select.value);
    if (next !== undefined) onChange(next);
  });
  return el('label', { class: 'widget widget--select' }, el('span', { class: 'widget__label' }, label), select);
}
