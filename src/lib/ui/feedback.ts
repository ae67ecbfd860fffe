import { el } from './dom.js';

export function errorCard(message: string): HTMLElement {
  return el('div', { class: 'error-card', role: 'alert' }, message);
}

export function emptyState(message: string): HTMLElement {
  return el('p', { class: 'empty-state' }, message);
}
