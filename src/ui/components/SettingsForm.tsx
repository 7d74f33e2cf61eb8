/**
 * Alert threshold form, posted as JSON to the settings API.
 */
import type { FC } from "hono/jsx";
import type { Settings } from "../../settings/index.js";

export const SettingsForm: FC<{ settings: Settings }> = ({ settings }) => (
  <form
    id="settings-form"
    hx-post="/api/settings"
    hx-ext="json-enc"
    hx-swap="none"
    hx-on--after-request="this.querySelector('output').textContent = event.detail.successful ? 'Saved' : 'Rejected'"
  >
    <div class="grid">
      <label>
        Full at or below (cm)
        <input
          type="number"
          name="thresholdCm"
          step="0.1"
          min="0"
          value={String(settings.thresholdCm)}
        />
      </label>
      <label>
        Empty at or above (cm)
        <input
          type="number"
          name="emptyThresholdCm"
          step="0.1"
          min="0"
          value={String(settings.emptyThresholdCm)}
        />
      </label>
      <label>
        Alert after (s)
        <input
          type="number"
          name="alertSustainSec"
          step="0.5"
          min="0"
          value={String(settings.alertSustainSec)}
        />
      </label>
    </div>
    <button type="submit">Save settings</button> <output />
  </form>
);
