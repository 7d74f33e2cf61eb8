/**
 * Base layout for the bin dashboard.
 *
 * Pico CSS for classless styling, HTMX for polling and form posts, and the
 * json-enc extension so forms post JSON to the same API the devices use.
 */
import type { FC, PropsWithChildren } from "hono/jsx";

type BaseLayoutProps = PropsWithChildren<{
  title: string;
  appName: string;
}>;

export const BaseLayout: FC<BaseLayoutProps> = ({ title, appName, children }) => (
  <html lang="en" data-theme="dark">
    <head>
      <meta charset="utf-8" />
      <meta name="viewport" content="width=device-width, initial-scale=1" />
      <meta name="color-scheme" content="dark" />

      <title>{title}</title>

      <link
        rel="stylesheet"
        href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
      />

      {/* Script tags need a closing tag in HTML */}
      <script src="https://unpkg.com/htmx.org@2">{""}</script>
      <script src="https://unpkg.com/htmx-ext-json-enc@2">{""}</script>
    </head>
    <body>
      <header class="container">
        <nav>
          <ul>
            <li>
              <strong>{appName}</strong>
            </li>
          </ul>
          <ul>
            <li>
              <a href="/">Dashboard</a>
            </li>
            <li>
              <a href="/history">History</a>
            </li>
          </ul>
        </nav>
      </header>
      <main class="container">{children}</main>
    </body>
  </html>
);
