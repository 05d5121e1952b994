/**
 * Environment for execa calls to git and tmux.
 *
 * Sessions are often started from editors or GUI launchers whose PATH lacks
 * Homebrew, MacPorts or Nix profile directories, so those are prepended.
 */

const extraDirs = [
  '/opt/homebrew/bin',
  '/opt/homebrew/sbin',
  '/usr/local/bin',
  '/opt/local/bin',
];

const home = process.env.HOME ?? '';
if (home) {
  extraDirs.push(`${home}/.nix-profile/bin`, `${home}/.local/bin`);
}

const augmentedPath = [...extraDirs, process.env.PATH].filter(Boolean).join(':');

export const execaEnv = {
  env: { PATH: augmentedPath },
};
