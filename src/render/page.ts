import { DEFAULT_ASSETS } from '../utils/config.js';
import type { PageAssets } from '../utils/config.js';
import type { FlameGraphPayload } from './flamegraph.js';

export type PageOptions = {
  baseUrl?: string; // path the series links point at
  assets?: PageAssets;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/** JSON that can sit inside a <script> element without ending it early. */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(
    /[<>&\u2028\u2029]/g,
    ch => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

// Nanosecond series read as seconds.
function valueScript(unit: string): string {
  if (unit === 'nanoseconds') {
    return `d3.format(".5f")(d.data.value / 1000000000) + " seconds"`;
  }
  return `d.data.value + " " + ${toScriptJson(unit)}`;
}

function labelScript(unit: string): string {
  return `return d.data.name + " (" + d3.format(".3f")(100 * (d.x1 - d.x0)) + "%, " + ${valueScript(unit)} + ")";`;
}

function tooltipScript(unit: string): string {
  return `return "name: " + d.data.name + ", value: " + ${valueScript(unit)};`;
}

function seriesLinks(payload: FlameGraphPayload, baseUrl: string): string {
  return payload.sampleTypes
    .map(type => {
      const href = `${baseUrl}?t=${encodeURIComponent(type)}`;
      const active = type === payload.sampleType ? ' class="active"' : '';
      return `<a href="${escapeHtml(href)}"${active}>${escapeHtml(type)}</a>`;
    })
    .join(' ');
}

export function buildFlameGraphHtml(payload: FlameGraphPayload, options: PageOptions = {}): string {
  const assets = options.assets ?? DEFAULT_ASSETS;
  const baseUrl = options.baseUrl ?? '/flamegraph';
  const legend = payload.legend.map(line => `<div>${escapeHtml(line)}</div>`).join('');
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<link rel="stylesheet" href="${escapeHtml(assets.flameGraphStylesheet)}">
<style>
  body { font-family: sans-serif; margin: 0 10%; }
  .legend { margin: 1em 0; font-size: 0.9em; }
  .series a { margin-right: 0.5em; }
  .series a.active { font-weight: bold; }
  .flame { display: flex; flex-direction: column; width: 100%; }
</style>
<title>${escapeHtml(payload.title)}</title>
</head>
<body>
<div class="legend">${legend}</div>
<div class="series">${seriesLinks(payload, baseUrl)}</div>
<div>
  <button id="resetzoom">Reset Zoom</button>
  <input id="search" type="search" placeholder="Search">
  <div class="flame"><div id="chart"></div></div>
</div>
<script src="${escapeHtml(assets.d3Script)}"></script>
<script src="${escapeHtml(assets.flameGraphScript)}"></script>
<script src="${escapeHtml(assets.flameGraphTooltipScript)}"></script>
<script type="text/javascript">
  var data = ${toScriptJson(payload.data)};
</script>
<script type="text/javascript">
  var label = function(d) {
    ${labelScript(payload.unit)}
  };
  var tip = flamegraph.tooltip.defaultFlamegraphTooltip().html(function(d) {
    ${tooltipScript(payload.unit)}
  });
  var chartEl = document.getElementById("chart");
  var chart = flamegraph()
    .width(chartEl.clientWidth)
    .cellHeight(18)
    .minFrameSize(5)
    .transitionDuration(750)
    .transitionEase(d3.easeCubic)
    .sort(true)
    .title("")
    .label(label)
    .tooltip(tip);
  d3.select("#chart").datum(data).call(chart);
  document.getElementById("resetzoom").addEventListener("click", function() {
    chart.resetZoom();
  });
  document.getElementById("search").addEventListener("input", function(e) {
    var term = e.target.value;
    if (term === "") {
      chart.clear();
    } else {
      chart.search(term);
    }
  });
  window.addEventListener("resize", function() {
    chart.width(chartEl.clientWidth);
    chart.resetZoom();
  }, true);
</script>
</body>
</html>
`;
}
