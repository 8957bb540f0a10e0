export function renderDashboardHtml(): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Access Log Insight</title>
    <style>
      :root {
        color-scheme: light;
        --bg: #f4f5f7;
        --card: #ffffff;
        --text: #1d2733;
        --muted: #5a6775;
        --line: #d8dee6;
        --accent: #0069d9;
        --accent-soft: #dbeafe;
        --ok: #0f766e;
      }
      * { box-sizing: border-box; }
      body {
        margin: 0;
        font-family: "IBM Plex Sans", "Segoe UI", sans-serif;
        color: var(--text);
        background: radial-gradient(circle at top right, #eaf2ff 0%, var(--bg) 40%);
      }
      .container { max-width: 1200px; margin: 0 auto; padding: 24px; }
      .header { margin-bottom: 16px; }
      .header h1 { margin: 0; font-size: 1.6rem; }
      .header p { margin: 6px 0 0; color: var(--muted); }
      .grid { display: grid; gap: 12px; grid-template-columns: repeat(12, 1fr); }
      .card { background: var(--card); border: 1px solid var(--line); border-radius: 10px; padding: 12px; }
      .filters, .summary, .traffic { grid-column: 1 / -1; }
      .addresses { grid-column: span 7; }
      .software { grid-column: span 5; }
      @media (max-width: 900px) {
        .addresses, .software { grid-column: 1 / -1; }
      }
      form { display: grid; gap: 10px; grid-template-columns: repeat(7, minmax(110px, 1fr)); align-items: end; }
      @media (max-width: 900px) {
        form { grid-template-columns: repeat(2, minmax(140px, 1fr)); }
      }
      label { display: grid; gap: 4px; font-size: 0.85rem; color: var(--muted); }
      input, select, button {
        font: inherit;
        padding: 7px 8px;
        border: 1px solid var(--line);
        border-radius: 7px;
        background: white;
      }
      button { cursor: pointer; border-color: var(--accent); background: var(--accent); color: white; }
      button.secondary { background: white; color: var(--accent); }
      .stats { display: flex; flex-wrap: wrap; gap: 24px; }
      .stat strong { display: block; font-size: 1.3rem; }
      .stat span { color: var(--muted); font-size: 0.85rem; }
      .bar-list { display: grid; gap: 8px; }
      .bar-row { display: grid; grid-template-columns: 180px 1fr 64px; align-items: center; gap: 8px; font-size: 0.9rem; }
      .bar { height: 16px; border-radius: 6px; background: var(--accent-soft); overflow: hidden; }
      .bar > span { display: block; height: 100%; background: var(--accent); }
      .pill { display: inline-block; font-size: 0.75rem; border-radius: 999px; padding: 2px 8px; background: #e6f4f1; color: var(--ok); }
      .empty { color: var(--muted); font-style: italic; }
    </style>
  </head>
  <body>
    <div class="container">
      <header class="header">
        <h1>Access Log Insight</h1>
        <p>Traffic, client addresses and browsers from web-server access logs</p>
      </header>
      <div class="grid">
        <section class="card filters">
          <form id="filters">
            <label>Date
              <input type="date" name="date" />
            </label>
            <label>Hour
              <input type="number" name="hour" min="0" max="23" />
            </label>
            <label>IP address
              <input type="text" name="ip" placeholder="exact match" />
            </label>
            <label>Browser
              <select name="browser">
                <option value="">All</option>
                <option value="Chrome">Chrome</option>
                <option value="Firefox">Firefox</option>
                <option value="Safari">Safari</option>
                <option value="FacebookBot">Facebook Bot</option>
                <option value="BotOrCrawler">Bot/Crawler</option>
                <option value="Other">Other</option>
                <option value="Unknown">Unknown</option>
              </select>
            </label>
            <label>Granularity
              <select name="granularity">
                <option value="hourly">Hourly</option>
                <option value="daily">Daily</option>
              </select>
            </label>
            <button type="submit">Apply</button>
            <button type="button" class="secondary" id="reload">Reload logs</button>
          </form>
        </section>

        <section class="card summary">
          <div id="filterDescription" class="pill">Showing all data</div>
          <div class="stats">
            <div class="stat"><strong id="totalEntries">0</strong><span>Requests</span></div>
            <div class="stat"><strong id="uniqueAddresses">0</strong><span>Unique IPs</span></div>
            <div class="stat"><strong id="dateRange">No data</strong><span>Date range</span></div>
            <div class="stat"><strong id="filesProcessed">0</strong><span>Files</span></div>
          </div>
        </section>

        <section class="card traffic">
          <h3 id="trafficTitle">Traffic</h3>
          <div id="traffic" class="bar-list"></div>
        </section>

        <section class="card addresses">
          <h3 id="addressesTitle">Top IP Addresses</h3>
          <div id="addresses" class="bar-list"></div>
        </section>

        <section class="card software">
          <h3 id="softwareTitle">Browser Usage Distribution</h3>
          <div id="software" class="bar-list"></div>
        </section>
      </div>
    </div>

    <script>
      const filtersForm = document.getElementById("filters");
      const reloadButton = document.getElementById("reload");

      function paramsFromForm() {
        const formData = new FormData(filtersForm);
        const params = new URLSearchParams();

        for (const pair of formData.entries()) {
          const key = pair[0];
          const rawValue = pair[1];
          if (typeof rawValue !== "string") {
            continue;
          }

          const value = rawValue.trim();
          if (value !== "") {
            params.set(key, value);
          }
        }

        return params;
      }

      function renderBars(rootId, rows, labelOf) {
        const root = document.getElementById(rootId);
        if (!rows || rows.length === 0) {
          root.innerHTML = '<div class="empty">No data</div>';
          return;
        }

        const max = Math.max.apply(null, rows.map((row) => row.count));
        root.innerHTML = rows.map((row) => {
          const width = max > 0 ? Math.max(row.count > 0 ? 3 : 0, Math.round((row.count / max) * 100)) : 0;
          return '<div class="bar-row">' +
            '<div>' + escapeHtml(labelOf(row)) + '</div>' +
            '<div class="bar"><span style="width:' + width + '%"></span></div>' +
            '<div>' + row.count + '</div>' +
          '</div>';
        }).join("");
      }

      function formatBucket(bucket) {
        return typeof bucket === "number" ? String(bucket).padStart(2, "0") + ":00" : bucket;
      }

      function setText(id, value) {
        document.getElementById(id).textContent = String(value);
      }

      async function fetchJson(path, params) {
        const response = await fetch(path + "?" + params.toString());
        const body = await response.json();
        if (!response.ok) {
          throw new Error(body.error || "Request failed: " + path);
        }
        return body;
      }

      async function refresh() {
        const params = paramsFromForm();
        const filterParams = new URLSearchParams(params);
        filterParams.delete("granularity");

        const results = await Promise.all([
          fetchJson("/api/logs", filterParams),
          fetchJson("/api/traffic", params),
          fetchJson("/api/addresses", filterParams),
          fetchJson("/api/software", filterParams),
        ]);
        const summary = results[0];
        const traffic = results[1];
        const addresses = results[2];
        const software = results[3];

        setText("filterDescription", summary.filterDescription);
        setText("totalEntries", summary.totalEntries);
        setText("uniqueAddresses", summary.uniqueAddresses);
        setText("dateRange", summary.dateRange);
        setText("filesProcessed", summary.filesProcessed.length);

        setText("trafficTitle", traffic.title);
        renderBars("traffic", traffic.points, (row) => formatBucket(row.bucket));
        setText("addressesTitle", addresses.title);
        renderBars("addresses", addresses.entries, (row) => row.value);
        setText("softwareTitle", software.title);
        renderBars("software", software.entries, (row) => row.label);
      }

      function escapeHtml(value) {
        return String(value)
          .replaceAll("&", "&amp;")
          .replaceAll("<", "&lt;")
          .replaceAll(">", "&gt;")
          .replaceAll('"', "&quot;")
          .replaceAll("'", "&#39;");
      }

      function reportFailure(error) {
        console.error(error);
        alert("Failed to load dashboard data: " + error.message);
      }

      filtersForm.addEventListener("submit", function(event) {
        event.preventDefault();
        refresh().catch(reportFailure);
      });

      reloadButton.addEventListener("click", function() {
        fetch("/api/refresh", { method: "POST" })
          .then((response) => {
            if (!response.ok) {
              throw new Error("Reload failed");
            }
            return refresh();
          })
          .catch(reportFailure);
      });

      refresh().catch(reportFailure);
    </script>
  </body>
</html>`;
}
