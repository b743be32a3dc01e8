export { DeviceManager } from './DeviceManager';
export type { DaemonProcess, SpawnFunction, DeviceManagerDependencies } from './DeviceManager';
export { GitHubReleaseInstaller, ReleaseDownloadError, selectAsset, DAEMON_BINARY_NAME } from './GitHubReleaseInstaller';
export type { GitHubReleaseInstallerConfig } from './GitHubReleaseInstaller';
export { renderDaemonConfig, DAEMON_CONFIG_FILE } from './DaemonConfigWriter';
export type { DaemonConfigInput } from './DaemonConfigWriter';
