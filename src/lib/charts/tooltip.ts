/**
 * Accessible tooltip manager.
 * @module charts/tooltip
 */

export interface TooltipHandle {
  element: HTMLDivElement;
  show(x: number, y: number, lines: readonly string[]): void;
  hide(): void;
}

/**
 * Create a tooltip attached to the provided root element. Content is set as
 * text, one line per entry.
 */
export function createTooltip(root: HTMLElement): TooltipHandle {
  const doc = root.ownerDocument ?? document;
  const tooltip = doc.createElement("div");
  tooltip.className = "tooltip";
  tooltip.setAttribute("role", "tooltip");
  tooltip.setAttribute("aria-hidden", "true");
  tooltip.style.position = "absolute";
  tooltip.style.pointerEvents = "none";
  tooltip.style.opacity = "0";

  const liveRegion = doc.createElement("div");
  liveRegion.className = "tooltip-live visually-hidden";
  liveRegion.setAttribute("aria-live", "polite");
  liveRegion.setAttribute("aria-atomic", "true");

  root.style.position = root.style.position || "relative";
  root.append(tooltip, liveRegion);

  const handle: TooltipHandle = {
    element: tooltip,
    show(x, y, lines) {
      tooltip.replaceChildren(
        ...lines.map((line) => {
          const row = doc.createElement("div");
          row.textContent = line;
          return row;
        }),
      );
      tooltip.style.left = `${Math.round(x)}px`;
      tooltip.style.top = `${Math.round(y)}px`;
      tooltip.setAttribute("aria-hidden", "false");
      tooltip.style.opacity = "1";
      liveRegion.textContent = lines.join(", ");
    },
    hide() {
      tooltip.style.opacity = "0";
      tooltip.setAttribute("aria-hidden", "true");
      liveRegion.textContent = "";
    },
  };

  root.addEventListener("keydown", (event: KeyboardEvent) => {
    if (event.key === "Escape") {
      handle.hide();
    }
  });

  return handle;
}
