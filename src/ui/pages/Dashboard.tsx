/**
 * Main dashboard: live device cards, polled every few seconds, and the
 * alert settings form.
 */
import type { FC } from "hono/jsx";
import type { DeviceSnapshot } from "../../devices/index.js";
import type { Settings } from "../../settings/index.js";
import { DeviceStatus } from "../components/DeviceStatus.js";
import { SettingsForm } from "../components/SettingsForm.js";
import { BaseLayout } from "../layouts/Base.js";

type DashboardProps = {
  appName: string;
  devices: Readonly<Record<string, DeviceSnapshot>>;
  settings: Settings;
};

export const DEVICE_POLL_INTERVAL = "every 5s";

export const Dashboard: FC<DashboardProps> = ({ appName, devices, settings }) => (
  <BaseLayout title={`${appName} Dashboard`} appName={appName}>
    <section>
      <h2>Bins</h2>
      <div
        id="devices"
        hx-get="/partials/devices"
        hx-trigger={DEVICE_POLL_INTERVAL}
        hx-swap="innerHTML"
      >
        <DeviceStatus devices={devices} />
      </div>
    </section>

    <section>
      <h2>Alert settings</h2>
      <SettingsForm settings={settings} />
    </section>
  </BaseLayout>
);
