export interface ColorEnvironment {
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}

export const useColor = ({ env, isTTY }: ColorEnvironment = {
  env: process.env,
  isTTY: Boolean(process.stdout.isTTY),
}): boolean => {
  // 1. NO_COLOR (https://no-color.org/)
  if (env.NO_COLOR !== undefined) return false;
  if (env.TERM === 'dumb') return false;

  // 2. Forced on
  if (env.FORCE_COLOR !== undefined && env.FORCE_COLOR !== '0') return true;

  // 3. TTY
  return isTTY;
};
