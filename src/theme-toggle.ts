import { darkTheme, defaultTheme, type ChartTheme } from "./lib/charts/theme.js";

export type ThemeMode = "light" | "dark";

const STORAGE_KEY = "dashboard-theme";

export function chartThemeFor(mode: ThemeMode): ChartTheme {
  return mode === "dark" ? darkTheme : defaultTheme;
}

function readStoredMode(): ThemeMode | null {
  try {
    const stored = window.localStorage.getItem(STORAGE_KEY);
    return stored === "dark" || stored === "light" ? stored : null;
  } catch {
    return null;
  }
}

/**
 * Apply the stored (or preferred) color scheme and wire the
 * `[data-theme-toggle]` button. `onChange` fires after each toggle.
 */
export function initThemeToggle(onChange: (mode: ThemeMode) => void = () => undefined): ThemeMode {
  const root = document.documentElement;
  let mode: ThemeMode =
    readStoredMode() ?? (window.matchMedia?.("(prefers-color-scheme: dark)").matches ? "dark" : "light");
  root.dataset.theme = mode;

  const toggle = document.querySelector<HTMLButtonElement>("[data-theme-toggle]");
  if (toggle) {
    const sync = () => toggle.setAttribute("aria-pressed", mode === "dark" ? "true" : "false");
    toggle.addEventListener("click", () => {
      mode = mode === "dark" ? "light" : "dark";
      root.dataset.theme = mode;
      try {
        window.localStorage.setItem(STORAGE_KEY, mode);
      } catch (error) {
        console.warn("[theme] unable to persist theme", error);
      }
      sync();
      onChange(mode);
    });
    sync();
  }
  return mode;
}
