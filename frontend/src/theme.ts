// Centralized theme configuration for charts and UI.

// Primary color palette
export const COLORS = {
  accent: "#ffb347",           // Amber (issue volume line)
  background: "rgba(0,0,0,0)", // Transparent
};

// Plot/chart styling
export const PLOT_COLORS = {
  grid: "#1f2833",
  line: "#314051",
  text: "#e6e9ee",
  hoverBg: "#2a3847",
  hoverBorder: "#ffb347",
  markerEdge: "#1a1f28",
};

// Sequential palettes, one per bar chart so adjacent charts stay distinguishable
export const PALETTES = {
  viridis: ["#440154", "#482878", "#3e4989", "#31688e", "#26828e", "#1f9e89", "#35b779", "#6ece58", "#b5de2b", "#fde725"],
  deep: ["#4c72b0", "#dd8452", "#55a868", "#c44e52", "#8172b3", "#937860", "#da8bc3", "#8c8c8c", "#ccb974", "#64b5cd"],
  cubehelix: ["#1a1530", "#163d4e", "#1f6642", "#53792f", "#a07949", "#d07e93", "#cf9cda", "#c1caf3", "#d2eeef", "#e8f6f3"],
  pastel: ["#a1c9f4", "#ffb482", "#8de5a1", "#ff9f9b", "#d0bbff", "#debb9b", "#fab0e4", "#cfcfcf", "#fffea3", "#b9f2f0"],
} as const;

export type PaletteName = keyof typeof PALETTES;

/** Colour for the i-th of n bars, spreading the palette across the bars. */
export function paletteColors(name: PaletteName, n: number): string[] {
  const palette = PALETTES[name];
  if (n <= 0) return [];
  if (n === 1) return [palette[Math.floor(palette.length / 2)]];
  return Array.from({ length: n }, (_, i) => palette[Math.round((i * (palette.length - 1)) / (n - 1))]);
}

// Layout template for Plotly charts
export const PLOT_LAYOUT_DARK = {
  paper_bgcolor: COLORS.background,
  plot_bgcolor: COLORS.background,
  font: { color: PLOT_COLORS.text, size: 12 },
  margin: { l: 60, r: 16, t: 48, b: 48 },
  hoverlabel: { bgcolor: PLOT_COLORS.hoverBg, bordercolor: PLOT_COLORS.hoverBorder, font: { color: PLOT_COLORS.text, size: 11 } },
};

export const AXIS_STYLE = {
  gridcolor: PLOT_COLORS.grid,
  zerolinecolor: PLOT_COLORS.grid,
  linecolor: PLOT_COLORS.line,
  automargin: true,
};
