/**
 * HTML served to the browser by the loopback callback listener.
 */

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Helvetica, Arial, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      height: 100vh;
      margin: 0;
      background: #0f172a;
    }
    .container {
      background: white;
      padding: 3rem;
      border-radius: 0.75rem;
      text-align: center;
      max-width: 420px;
    }
    .icon { font-size: 3rem; margin-bottom: 1rem; }
    .success { color: #16a34a; }
    .error { color: #dc2626; }
    h1 { color: #0f172a; margin-bottom: 0.5rem; }
    p { color: #475569; }
    .hint { font-size: 0.875rem; color: #94a3b8; }`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${title}</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="container">
${body}
  </div>
</body>
</html>
`;
}

export function renderSuccessPage(): string {
  return page(
    "Beacon CLI: signed in",
    `    <div class="icon success">&#10003;</div>
    <h1>Signed in</h1>
    <p>The Beacon CLI is now authorized.</p>
    <p class="hint">You can close this window and return to your terminal.</p>`
  );
}

export function renderErrorPage(error: string, description?: string): string {
  const detail = description
    ? `\n    <p>${escapeHtml(description)}</p>`
    : "";
  return page(
    "Beacon CLI: authorization failed",
    `    <div class="icon error">&#10007;</div>
    <h1>Authorization failed</h1>
    <p><code>${escapeHtml(error)}</code></p>${detail}
    <p class="hint">Return to your terminal and run <code>beacon auth login</code> again.</p>`
  );
}
