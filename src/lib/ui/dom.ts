export function el<K extends keyof HTMLElementTagNameMap>(
  tag: K,
  attrs: Partial<Record<string, string>> = {},
  ...children: Array<Node | string | null | undefined>
): HTMLElementTagNameMap[K] {
  const node = document.createElement(tag);
  for (const [k, v] of Object.entries(attrs)) {
    if (v != null) node.setAttribute(k, v);
  }
  for (const c of children) {
    if (c == null) continue;
    node.appendChild(typeof c === 'string' ? document.createTextNode(c) : c);
  }
  return node;
}

export function clear(node: Element) {
  while (node.firstChild) node.removeChild(node.firstChild);
}

export function section(title: string, ...content: Element[]) {
  return el('section', { class: 'section' },
    el('h2', { class: 'section-title' }, title),
    ...content
  );
}

export type Cell = string | number | null | undefined;

export function table(headers: string[], rows: Cell[][], options: { caption?: string } = {}) {
  const tbl = el('table', { class: 'data' });
  if (options.caption) tbl.appendChild(el('caption', {}, options.caption));
  const thead = el('thead');
  const trh = el('tr');
  headers.forEach(h => trh.appendChild(el('th', { scope: 'col' }, h)));
  thead.appendChild(trh);
  const tbody = el('tbody');
  rows.forEach(r => {
    const tr = el('tr');
    r.forEach(c => tr.appendChild(el('td', typeof c === 'number' ? { class: 'num' } : {}, c == null ? '' : String(c))));
    tbody.appendChild(tr);
  });
  tbl.appendChild(thead);
  tbl.appendChild(tbody);
  return el('div', { class: 'table-shell' }, tbl);
}
