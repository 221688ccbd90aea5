type AppEnvironment = 'dev' | 'staging' | 'prod';

declare const __APP_VERSION__: string | undefined;
declare const __BUILD_TIME__: string | undefined;
declare const __GIT_COMMIT__: string | undefined;

const resolveAppEnvironment = (): AppEnvironment => {
  const normalized = (import.meta.env.MODE ?? '').toLowerCase();
  if (normalized === 'production' || normalized === 'prod') {
    return 'prod';
  }
  if (normalized === 'staging') {
    return 'staging';
  }
  return 'dev';
};

export const appVersion =
  typeof __APP_VERSION__ === 'string' ? __APP_VERSION__ : '0.0.0';

export const buildTime =
  typeof __BUILD_TIME__ === 'string' ? __BUILD_TIME__ : '';

export const gitCommit =
  typeof __GIT_COMMIT__ === 'string' ? __GIT_COMMIT__ : '';

export const appEnvironment = resolveAppEnvironment();

export const versionLabel = (): string => {
  const parts = [`v${appVersion}`];
  if (appEnvironment !== 'prod') {
    parts.push(appEnvironment);
  }
  if (gitCommit) {
    parts.push(gitCommit.slice(0, 7));
  }
  return parts.join(' · ');
};
