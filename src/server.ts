import { config } from './config';
import { createApp } from './app';
import { loadProfile } from './db';
import { ProfileSession } from './scorer/profile';
import { resolveScoringConfig } from './scorer/config';

// The profile lives as long as this server instance; the last saved one is restored on boot
const session = new ProfileSession(loadProfile() ?? undefined);
const scoring = resolveScoringConfig(config.SCORING_PRESET);

const app = createApp({ session, scoring });

app.listen(config.PORT, () => {
  console.log(`[Jobs] Server running on http://localhost:${config.PORT} (scoring preset: ${config.SCORING_PRESET})`);
});
