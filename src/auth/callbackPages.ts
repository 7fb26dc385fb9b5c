/**
 * Static pages served to the browser by the loopback listener.
 * Kept short: the tab only has to tell the user to go back to the app.
 */

const PAGE_STYLE = `
      body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 40px; background: #f5f5f5; }
      .container { max-width: 500px; margin: 0 auto; background: white; padding: 40px; border-radius: 8px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); text-align: center; }
      h1 { color: #333; margin-bottom: 10px; }
      p { color: #666; margin-bottom: 20px; }
      .error-code { background: #f5f5f5; padding: 10px; border-radius: 4px; font-family: monospace; }`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <title>${title}</title>
    <style>${PAGE_STYLE}
    </style>
  </head>
  <body>
    <div class="container">
${body}
    </div>
    <script>setTimeout(() => window.close(), 3000);</script>
  </body>
</html>
`;
}

/**
 * Page for the captured redirect. Whether the sign-in finally succeeds is only
 * known after the token exchange, so the wording stays neutral.
 */
export function renderCallbackPage(query: Readonly<Record<string, string>>, appName: string): string {
  const error = query.error;
  if (error) {
    const description = query.error_description;
    return page('Sign-in Not Completed', `      <h1>Sign-in Not Completed</h1>
      <p>The sign-in request was not approved.</p>
      <div class="error-code">
        <strong>Error:</strong> ${escapeHtml(error)}${description ? `<br><strong>Description:</strong> ${escapeHtml(description)}` : ''}
      </div>
      <p>You can close this tab and return to ${escapeHtml(appName)}.</p>`);
  }

  return page('Sign-in Received', `      <h1>Sign-in Received</h1>
      <p>You can close this tab and return to ${escapeHtml(appName)}.</p>`);
}
