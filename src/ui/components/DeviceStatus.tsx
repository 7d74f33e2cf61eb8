/**
 * Live device cards. Rendered inside the dashboard and re-rendered as a
 * fragment for HTMX polling.
 */
import type { FC } from "hono/jsx";
import type { DeviceSnapshot } from "../../devices/index.js";

const FILL_COLORS: Readonly<Record<string, string>> = {
  full: "#e5484d",
  partial: "#f5a524",
  empty: "#30a46c",
};

const display = (value: unknown): string =>
  typeof value === "number" || typeof value === "string" ? String(value) : "—";

const DeviceCard: FC<{ deviceId: string; snapshot: DeviceSnapshot }> = ({
  deviceId,
  snapshot,
}) => (
  <article
    id={`device-${deviceId}`}
    style={{ borderTop: `4px solid ${FILL_COLORS[snapshot.fillStatus] ?? "#888"}` }}
  >
    <header>
      <strong>{deviceId}</strong> <mark>{snapshot.fillStatus}</mark>
    </header>
    <dl>
      <dt>Distance</dt>
      <dd>{display(snapshot.distance)} cm</dd>
      <dt>Servo</dt>
      <dd>{display(snapshot.servoPosition)}°</dd>
      <dt>Last report</dt>
      <dd>
        <time datetime={snapshot.serverTimestamp}>{snapshot.serverTimestamp}</time>
      </dd>
    </dl>
    <footer>
      <div role="group">
        <button
          type="button"
          class="outline"
          hx-post="/api/command"
          hx-ext="json-enc"
          hx-vals={JSON.stringify({ deviceId, action: "open" })}
          hx-swap="none"
        >
          Open
        </button>
        <button
          type="button"
          class="outline"
          hx-post="/api/command"
          hx-ext="json-enc"
          hx-vals={JSON.stringify({ deviceId, action: "close" })}
          hx-swap="none"
        >
          Close
        </button>
        <button
          type="button"
          class="secondary outline"
          hx-post="/api/command"
          hx-ext="json-enc"
          hx-vals={JSON.stringify({ deviceId, action: "auto" })}
          hx-swap="none"
        >
          Auto
        </button>
      </div>
    </footer>
  </article>
);

export const DeviceStatus: FC<{
  devices: Readonly<Record<string, DeviceSnapshot>>;
}> = ({ devices }) => {
  const entries = Object.entries(devices);

  if (entries.length === 0) {
    return <p id="no-devices">No devices have reported yet.</p>;
  }

  return (
    <div class="grid">
      {entries.map(([deviceId, snapshot]) => (
        <DeviceCard deviceId={deviceId} snapshot={snapshot} />
      ))}
    </div>
  );
};
