import { listPersonas } from "../llm/personas.js";
import { exampleLanguages } from "../examples/catalog.js";

function options(values: Array<{ value: string; label: string }>): string {
  return values
    .map((v) => `<option value="${v.value}">${v.label}</option>`)
    .join("\n        ");
}

export function renderDashboard(): string {
  const personaOptions = options(
    listPersonas().map((p) => ({ value: p.id, label: p.title }))
  );
  const exampleOptions = options(
    exampleLanguages().map((l) => ({ value: l, label: l }))
  );

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>kindly-review - Empathetic Code Review</title>
  <script src="https://cdn.jsdelivr.net/npm/chart.js@4"></script>
  <style>
    :root {
      --bg: #0d1117; --surface: #161b22; --border: #30363d;
      --text: #e6edf3; --muted: #8b949e; --accent: #58a6ff;
      --green: #3fb950; --red: #f85149; --yellow: #d29922;
    }
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif; background: var(--bg); color: var(--text); }
    .header { padding: 20px 32px; border-bottom: 1px solid var(--border); display: flex; align-items: center; gap: 16px; }
    .header h1 { font-size: 20px; font-weight: 600; }
    .header .controls { margin-left: auto; display: flex; gap: 8px; }
    select, button { background: var(--surface); color: var(--text); border: 1px solid var(--border); border-radius: 6px; padding: 6px 12px; font-size: 14px; cursor: pointer; }
    button.primary { background: var(--accent); color: var(--bg); border-color: var(--accent); font-weight: 600; }
    textarea { width: 100%; min-height: 220px; background: var(--surface); color: var(--text); border: 1px solid var(--border); border-radius: 8px; padding: 12px; font-family: ui-monospace, monospace; font-size: 13px; }
    .layout { display: grid; grid-template-columns: 1fr 1fr; gap: 16px; padding: 24px 32px; }
    .card { background: var(--surface); border: 1px solid var(--border); border-radius: 12px; padding: 20px; }
    .card h3 { font-size: 13px; color: var(--muted); text-transform: uppercase; letter-spacing: 0.5px; margin-bottom: 8px; }
    .stats { display: grid; grid-template-columns: repeat(4, 1fr); gap: 12px; margin-bottom: 16px; }
    .stat { font-size: 28px; font-weight: 700; }
    .stat.green { color: var(--green); }
    .stat.yellow { color: var(--yellow); }
    .stat.red { color: var(--red); }
    .actions { display: flex; gap: 8px; margin-top: 12px; }
    .error { color: var(--red); margin-top: 8px; min-height: 18px; }
    canvas { max-height: 280px; }
    pre.report { white-space: pre-wrap; font-size: 13px; line-height: 1.5; }
    @media (max-width: 900px) {
      .layout { grid-template-columns: 1fr; }
      .stats { grid-template-columns: 1fr 1fr; }
    }
  </style>
</head>
<body>
  <div class="header">
    <h1>kindly-review</h1>
    <span style="color: var(--muted)">Empathetic Code Review</span>
    <div class="controls">
      <select id="example-select">
        ${exampleOptions}
      </select>
      <button id="load-example">Load Example</button>
      <select id="persona-select">
        ${personaOptions}
      </select>
    </div>
  </div>

  <div class="layout">
    <div class="card">
      <h3>Review Input (JSON)</h3>
      <textarea id="input"></textarea>
      <div class="actions">
        <button id="analyze">Analyze</button>
        <button id="review" class="primary">Generate Review</button>
      </div>
      <div class="error" id="error"></div>
    </div>
    <div class="card">
      <div class="stats" id="stats"></div>
      <canvas id="quality-chart"></canvas>
    </div>
    <div class="card">
      <h3>Overall Score</h3>
      <canvas id="gauge-chart"></canvas>
    </div>
    <div class="card">
      <h3>Comment Severity</h3>
      <canvas id="severity-chart"></canvas>
    </div>
  </div>

  <div class="layout" style="grid-template-columns: 1fr; padding-top: 0">
    <div class="card">
      <h3>Report</h3>
      <div class="actions" id="downloads" style="display: none">
        <button id="download-md">Download Markdown</button>
        <button id="download-enhanced">Download Enhanced Report</button>
      </div>
      <pre class="report" id="report">Generate a review to see the report.</pre>
    </div>
  </div>

  <script>
    let qualityChart, gaugeChart, severityChart, lastReport;
    const muted = '#8b949e';

    function showError(message) {
      document.getElementById('error').textContent = message || '';
    }

    async function post(path) {
      showError('');
      const persona = document.getElementById('persona-select').value;
      const query = path === '/review' ? '?persona=' + encodeURIComponent(persona) : '';
      const res = await fetch('/api' + path + query, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: document.getElementById('input').value
      });
      const data = await res.json();
      if (!res.ok) {
        showError(data.reason ? data.reason + ': ' + data.error : data.error);
        return null;
      }
      return data;
    }

    function scoreColor(v) { return v >= 7 ? 'green' : v >= 4 ? 'yellow' : 'red'; }

    function renderAnalysis(a) {
      const s = a.quality.subscores;
      document.getElementById('stats').innerHTML =
        stat('Overall', a.quality.overall) +
        stat('Potential', a.quality.improvement_potential, true) +
        '<div><h3>Language</h3><div class="stat">' + a.language + '</div></div>' +
        '<div><h3>Comments</h3><div class="stat">' + a.total_issues + '</div></div>';

      const labels = ['Readability', 'Performance', 'Maintainability', 'Best Practices'];
      const values = [s.Readability, s.Performance, s.Maintainability, s.BestPractices];
      if (qualityChart) qualityChart.destroy();
      qualityChart = new Chart(document.getElementById('quality-chart'), {
        type: 'radar',
        data: {
          labels: labels,
          datasets: [
            { label: 'Current Score', data: values, borderColor: '#58a6ff', backgroundColor: 'rgba(88,166,255,0.3)' },
            { label: 'Maximum Score', data: labels.map(() => 10), borderColor: '#3fb950', backgroundColor: 'rgba(63,185,80,0.05)' }
          ]
        },
        options: { scales: { r: { min: 0, max: 10, ticks: { color: muted, backdropColor: 'transparent' }, grid: { color: '#21262d' }, pointLabels: { color: muted } } }, plugins: { legend: { labels: { color: muted } } } }
      });

      if (gaugeChart) gaugeChart.destroy();
      gaugeChart = new Chart(document.getElementById('gauge-chart'), {
        type: 'doughnut',
        data: {
          labels: ['Score', 'Remaining'],
          datasets: [{ data: [a.quality.overall, 10 - a.quality.overall], backgroundColor: ['#58a6ff', '#30363d'], borderWidth: 0 }]
        },
        options: { rotation: -90, circumference: 180, cutout: '70%', plugins: { legend: { display: false } } }
      });

      const b = a.severity_breakdown;
      if (severityChart) severityChart.destroy();
      severityChart = new Chart(document.getElementById('severity-chart'), {
        type: 'bar',
        data: {
          labels: ['Mild', 'Moderate', 'Harsh'],
          datasets: [{ label: 'Comments', data: [b.Mild, b.Moderate, b.Harsh], backgroundColor: ['#3fb950', '#d29922', '#f85149'], borderRadius: 4 }]
        },
        options: { plugins: { legend: { display: false } }, scales: { x: { ticks: { color: muted } }, y: { ticks: { color: muted, precision: 0 } } } }
      });
    }

    function stat(title, value, inverse) {
      const color = inverse ? scoreColor(10 - value) : scoreColor(value);
      return '<div><h3>' + title + '</h3><div class="stat ' + color + '">' + value.toFixed(1) + '</div></div>';
    }

    function download(name, text) {
      const url = URL.createObjectURL(new Blob([text], { type: 'text/markdown' }));
      const a = document.createElement('a');
      a.href = url;
      a.download = name;
      a.click();
      URL.revokeObjectURL(url);
    }

    function stamp() { return new Date().toISOString().replace(/[-:]/g, '').slice(0, 15); }

    document.getElementById('load-example').addEventListener('click', async () => {
      const lang = document.getElementById('example-select').value;
      const res = await fetch('/api/examples/' + lang);
      document.getElementById('input').value = JSON.stringify(await res.json(), null, 2);
    });

    document.getElementById('analyze').addEventListener('click', async () => {
      const a = await post('/analyze');
      if (a) renderAnalysis(a);
    });

    document.getElementById('review').addEventListener('click', async () => {
      document.getElementById('report').textContent = 'Generating...';
      const r = await post('/review');
      if (!r) { document.getElementById('report').textContent = ''; return; }
      lastReport = r;
      renderAnalysis(r.analysis);
      document.getElementById('report').textContent = r.markdown;
      document.getElementById('downloads').style.display = 'flex';
    });

    document.getElementById('download-md').addEventListener('click', () => {
      if (lastReport) download('review_' + stamp() + '.md', lastReport.markdown);
    });
    document.getElementById('download-enhanced').addEventListener('click', () => {
      if (lastReport) download('enhanced_review_' + stamp() + '.md', lastReport.enhanced_markdown);
    });
  </script>
</body>
</html>`;
}
