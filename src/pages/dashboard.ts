import { CONFIG } from "../lib/config.js";
import { movieSection, type SectionHandle } from "../lib/dashboard/movies-section.js";
import { speciesSection } from "../lib/dashboard/species-section.js";
import { readState, writeState, type DashboardState } from "../lib/dashboard/state.js";
import { loadTable } from "../lib/data/load.js";
import { replaceQuery } from "../lib/ui/url.js";
import { chartThemeFor, initThemeToggle } from "../theme-toggle.js";

const app = document.getElementById("app");
if (!app) {
  throw new Error("Dashboard root #app is missing");
}

app.innerHTML = `
  <header class="page-header">
    <h1>Movies and Animal Data Visualization</h1>
    <p class="lede">
      Which movie genres performed best at the box office over the years, and how
      animal survival strategies relate to each other. Use the controls to explore.
    </p>
  </header>
  <div id="movies-root" class="dashboard-slot" aria-busy="true"></div>
  <div id="species-root" class="dashboard-slot" aria-busy="true"></div>
`;

const state: DashboardState = readState(window.location.search, CONFIG);
const persist = () => replaceQuery(writeState(state));

const [movieTable, speciesTable] = await Promise.all([
  loadTable(CONFIG.moviesPath, "Movies"),
  loadTable(CONFIG.speciesPath, "Species"),
]);

let handles: SectionHandle<unknown>[] = [];
const mode = initThemeToggle((next) => {
  handles.forEach((handle) => handle.refresh(chartThemeFor(next)));
});
const theme = chartThemeFor(mode);

const movies = movieSection(movieTable, state.movies, {
  config: CONFIG,
  theme,
  onChange: (selection) => {
    state.movies = selection;
    persist();
  },
});
const species = speciesSection(speciesTable, state.species, {
  config: CONFIG,
  theme,
  onChange: (selection) => {
    state.species = selection;
    persist();
  },
});
handles = [movies, species];
// Unknown names from the query are already dropped by the sections.
state.movies = movies.selection();
state.species = species.selection();

for (const [id, handle] of [["movies-root", movies], ["species-root", species]] as const) {
  const root = document.getElementById(id);
  root?.replaceChildren(handle.element);
  root?.removeAttribute("aria-busy");
}
persist();
