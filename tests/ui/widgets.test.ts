/** @vitest-environment jsdom */
import { describe, expect, it, vi } from "vitest";

import { multiSelect, rangeSlider, selectBox } from "../../src/lib/ui/widgets.js";

function checkbox(root: Element, value: string): HTMLInputElement {
  const input = root.querySelector<HTMLInputElement>(`input[value="${value}"]`);
  if (!input) throw new Error(`no checkbox for ${value}`);
  return input;
}

describe("multiSelect", () => {
  it("reports the selection in option order", () => {
    const onChange = vi.fn<(selected: string[]) => void>();
    const root = multiSelect({ label: "Letters", options: ["a", "b", "c"], selected: ["c"], onChange });
    expect(root.querySelector("legend")?.textContent).toBe("Letters");

    const a = checkbox(root, "a");
    a.checked = true;
    a.dispatchEvent(new Event("change"));
    expect(onChange).toHaveBeenLastCalledWith(["a", "c"]);

    const c = checkbox(root, "c");
    c.checked = false;
    c.dispatchEvent(new Event("change"));
    expect(onChange).toHaveBeenLastCalledWith(["a"]);
  });
});

describe("rangeSlider", () => {
  it("drags the other handle along when they cross", () => {
    const onChange = vi.fn<(value: [number, number]) => void>();
    const root = rangeSlider({ label: "Years", min: 1990, max: 2020, value: [2000, 2005], onChange });
    const low = root.querySelector<HTMLInputElement>('input[data-handle="low"]');
    const high = root.querySelector<HTMLInputElement>('input[data-handle="high"]');
    if (!low || !high) throw new Error("missing handles");

    expect(root.querySelector("output")?.textContent).toBe("2000 – 2005");

    low.value = "2010";
    low.dispatchEvent(new Event("input"));
    expect(onChange).toHaveBeenLastCalledWith([2010, 2010]);
    expect(high.value).toBe("2010");

    high.value = "1995";
    high.dispatchEvent(new Event("input"));
    expect(onChange).toHaveBeenLastCalledWith([1995, 1995]);
    expect(root.querySelector("output")?.textContent).toBe("1995 – 1995");
  });
});

describe("selectBox", () => {
  it("selects the initial value and reports changes", () => {
    const onChange = vi.fn<(value: "x" | "y") => void>();
    const root = selectBox<"x" | "y">({ label: "Axis", options: ["x", "y"], value: "y", onChange });
    const select = root.querySelector("select");
    if (!select) throw new Error("missing select");
    expect(select.value).toBe("y");

    select.value = "x";
    select.dispatchEvent(new Event("change"));
    expect(onChange).toHaveBeenCalledWith("x");
  });
});
