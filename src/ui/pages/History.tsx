/**
 * History page: pick a device, browse its stored readings newest first.
 */
import type { FC } from "hono/jsx";
import type { HistoryPage as HistoryPageData } from "../../history/index.js";
import { HistoryTable } from "../components/HistoryTable.js";
import { BaseLayout } from "../layouts/Base.js";

type HistoryProps = {
  appName: string;
  deviceIds: ReadonlyArray<string>;
  page: HistoryPageData;
};

export const History: FC<HistoryProps> = ({ appName, deviceIds, page }) => (
  <BaseLayout title={`${appName} History`} appName={appName}>
    <h2>History{page.deviceId ? ` · ${page.deviceId}` : ""}</h2>

    {deviceIds.length > 1 ? (
      <nav>
        <ul>
          {deviceIds.map((deviceId) => (
            <li>
              <a
                href={`/history?deviceId=${encodeURIComponent(deviceId)}`}
                aria-current={deviceId === page.deviceId ? "page" : undefined}
              >
                {deviceId}
              </a>
            </li>
          ))}
        </ul>
      </nav>
    ) : null}

    <HistoryTable page={page} />
  </BaseLayout>
);
