// ---------------------------------------------------------------------------
// Form-based front page. Every form posts to the JSON API and shows the
// operation's message; the listings reload after each change.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../types.js";

const PAGE = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Lending Desk</title>
    <style>
      :root {
        --bg: #f5f7fb;
        --panel: #ffffff;
        --line: #dfe4ee;
        --text: #1f2937;
        --muted: #64748b;
        --accent: #3b82f6;
        --ok: #10b981;
        --danger: #ef4444;
        --mono: ui-monospace, SFMono-Regular, Menlo, Consolas, monospace;
        --sans: ui-sans-serif, system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif;
      }
      body { margin: 0; background: var(--bg); color: var(--text); font-family: var(--sans); }
      header { background: var(--accent); color: white; padding: 14px 20px; font-size: 22px; font-weight: 700; }
      .wrap { max-width: 1100px; margin: 0 auto; padding: 18px; display: grid; grid-template-columns: 340px 1fr; gap: 18px; }
      .card { background: var(--panel); border: 1px solid var(--line); border-radius: 12px; padding: 14px; margin-bottom: 14px; }
      h2 { font-size: 15px; margin: 0 0 10px; }
      label { display: block; font-size: 12px; color: var(--muted); margin-top: 6px; }
      input, select { width: 100%; box-sizing: border-box; padding: 8px; border: 1px solid var(--line); border-radius: 8px; font-size: 14px; }
      .actions { display: flex; gap: 8px; margin-top: 10px; }
      button { background: var(--accent); color: white; border: 0; border-radius: 8px; padding: 8px 12px; font-weight: 650; cursor: pointer; }
      button.secondary { background: var(--muted); }
      #message { font-family: var(--mono); font-size: 13px; white-space: pre-wrap; }
      #message.ok { color: var(--ok); }
      #message.fail { color: var(--danger); }
      pre { font-family: var(--mono); font-size: 13px; background: #0f172a; color: #e2e8f0; padding: 12px; border-radius: 10px; min-height: 320px; white-space: pre-wrap; margin: 0; }
      @media (max-width: 800px) { .wrap { grid-template-columns: 1fr; } }
    </style>
  </head>
  <body>
    <header>Lending Desk</header>
    <div class="wrap">
      <div>
        <form class="card" data-endpoint="/books">
          <h2>Add book</h2>
          <label>Book ID<input name="id" required /></label>
          <label>Title<input name="title" required /></label>
          <label>Author<input name="author" /></label>
          <label>Copies<input name="copies" type="number" min="1" value="1" /></label>
          <div class="actions"><button type="submit">Add book</button></div>
        </form>

        <form class="card" data-endpoint="/members">
          <h2>Add member</h2>
          <label>Member ID<input name="id" required /></label>
          <label>Name<input name="name" required /></label>
          <div class="actions"><button type="submit">Add member</button></div>
        </form>

        <form class="card" id="lending">
          <h2>Borrow / return</h2>
          <label>Address by
            <select name="mode">
              <option value="id">Member ID and book ID</option>
              <option value="name">Member name and book title</option>
            </select>
          </label>
          <label>Member<input name="member" required /></label>
          <label>Book<input name="book" required /></label>
          <div class="actions">
            <button type="submit" value="borrow">Borrow</button>
            <button type="submit" value="return">Return</button>
          </div>
        </form>

        <form class="card" id="search">
          <h2>Search books</h2>
          <label>Title or author keyword<input name="q" /></label>
          <div class="actions"><button type="submit">Search</button></div>
        </form>
      </div>

      <div>
        <div class="card">
          <div id="message">Ready.</div>
        </div>
        <div class="card">
          <div class="actions" style="margin: 0 0 10px;">
            <button class="secondary" data-view="/books">All books</button>
            <button class="secondary" data-view="/books?status=available">Available</button>
            <button class="secondary" data-view="/books?status=borrowed">Borrowed</button>
            <button class="secondary" data-view="/members">Members</button>
            <button class="secondary" data-view="/history">History</button>
          </div>
          <pre id="output"></pre>
        </div>
      </div>
    </div>

    <script>
      const messageEl = document.getElementById('message');
      const outputEl = document.getElementById('output');
      let currentView = '/books';

      function showMessage(report) {
        messageEl.textContent = report.message;
        messageEl.className = report.success ? 'ok' : 'fail';
      }

      async function call(path, body) {
        const res = await fetch(path, body === undefined ? {} : {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify(body),
        });
        return res.json();
      }

      async function showView(path) {
        currentView = path;
        const report = await call(path);
        outputEl.textContent = report.message;
      }

      document.querySelectorAll('form[data-endpoint]').forEach((form) => {
        form.addEventListener('submit', async (ev) => {
          ev.preventDefault();
          const body = Object.fromEntries(new FormData(form));
          showMessage(await call(form.dataset.endpoint, body));
          form.reset();
          showView(currentView);
        });
      });

      document.getElementById('lending').addEventListener('submit', async (ev) => {
        ev.preventDefault();
        const data = new FormData(ev.target);
        const mode = data.get('mode');
        const body = mode === 'id'
          ? { mode, memberId: data.get('member'), bookId: data.get('book') }
          : { mode, memberName: data.get('member'), bookTitle: data.get('book') };
        const action = ev.submitter && ev.submitter.value === 'return' ? 'return' : 'borrow';
        showMessage(await call('/loans/' + action, body));
        showView(currentView);
      });

      document.getElementById('search').addEventListener('submit', async (ev) => {
        ev.preventDefault();
        const q = new FormData(ev.target).get('q') || '';
        showView('/books?q=' + encodeURIComponent(q));
      });

      document.querySelectorAll('[data-view]').forEach((btn) => {
        btn.addEventListener('click', () => showView(btn.dataset.view));
      });

      showView(currentView);
    </script>
  </body>
</html>`;

/** `GET /` -- the form page. Clients not asking for HTML get a route index. */
export function pageRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const accept = c.req.header("accept") ?? "";
    const wantsHtml = accept.includes("text/html") || accept.includes("*/*");

    if (!wantsHtml) {
      return c.json({
        service: "lending-desk",
        routes: ["/health", "/books", "/members", "/loans/borrow", "/loans/return", "/history"],
      });
    }

    return c.html(PAGE);
  });

  return app;
}
