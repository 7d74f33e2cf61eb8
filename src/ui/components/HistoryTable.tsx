/**
 * Paged reading table with device and page navigation.
 */
import type { FC } from "hono/jsx";
import type { HistoryPage } from "../../history/index.js";

const cell = (value: string | number | null): string =>
  value === null ? "—" : String(value);

const pageHref = (deviceId: string | null, page: number, pageSize: number): string => {
  const params = new URLSearchParams({ page: String(page), pageSize: String(pageSize) });
  if (deviceId !== null) {
    params.set("deviceId", deviceId);
  }
  return `/history?${params.toString()}`;
};

export const HistoryTable: FC<{ page: HistoryPage }> = ({ page }) => {
  if (page.total === 0) {
    return <p>No readings stored.</p>;
  }

  return (
    <section>
      <table class="striped">
        <thead>
          <tr>
            <th scope="col">Server time</th>
            <th scope="col">Distance (cm)</th>
            <th scope="col">Status</th>
            <th scope="col">Motion</th>
            <th scope="col">Servo</th>
            <th scope="col">Target</th>
          </tr>
        </thead>
        <tbody>
          {page.rows.map((row) => (
            <tr>
              <td>{row.serverTimestamp}</td>
              <td>{cell(row.distance)}</td>
              <td>{row.fillStatus}</td>
              <td>{row.motion === 1 ? "yes" : "no"}</td>
              <td>{cell(row.servoPosition)}</td>
              <td>{cell(row.targetPosition)}</td>
            </tr>
          ))}
        </tbody>
      </table>
      <nav>
        <ul>
          {page.page > 1 ? (
            <li>
              <a href={pageHref(page.deviceId, page.page - 1, page.pageSize)}>← Newer</a>
            </li>
          ) : null}
          <li>
            Page {page.page} of {page.totalPages} ({page.total} readings)
          </li>
          {page.page < page.totalPages ? (
            <li>
              <a href={pageHref(page.deviceId, page.page + 1, page.pageSize)}>Older →</a>
            </li>
          ) : null}
        </ul>
      </nav>
    </section>
  );
};
