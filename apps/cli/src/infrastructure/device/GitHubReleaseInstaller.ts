/**
 * spotifyd installer backed by GitHub releases
 *
 * Picks the release asset matching the platform, downloads it into a
 * temporary directory, extracts the `spotifyd` binary from a .tar.gz (or
 * takes the download as the binary itself) and installs it with mode 0755.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Logger } from 'pino';
import * as tar from 'tar';
import { z } from 'zod';
import { InstallError, PlatformProfile, Result } from '@spotify-controller/shared';
import { IDaemonInstaller, ReleaseAsset } from '../../domain/controller';
import { strategyFor } from '../platform';

export const DAEMON_BINARY_NAME = 'spotifyd';

export interface GitHubReleaseInstallerConfig {
  releasesUrl?: string;
  metadataTimeout?: number;
  downloadTimeout?: number;
  userAgent?: string;
}

export class ReleaseDownloadError extends Error {
  constructor(
    message: string,
    public readonly code: 'HTTP_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT_ERROR' | 'INVALID_RESPONSE' | 'EXTRACTION_FAILED',
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'ReleaseDownloadError';
  }
}

const releaseSchema = z.object({
  tag_name: z.string(),
  assets: z.array(z.object({
    name: z.string(),
    browser_download_url: z.string().url()
  }))
});

const CHECKSUM_SUFFIXES = ['.sha256', '.sha512', '.sig', '.asc', '.md5'];

/**
 * Choose the asset for the first candidate that matches.
 * Checksums are skipped; among several archives the `full` build wins.
 */
export function selectAsset(assets: readonly ReleaseAsset[], candidates: readonly string[]): ReleaseAsset | null {
  for (const candidate of candidates) {
    const matches = assets.filter(asset =>
      asset.name.includes(candidate) &&
      !CHECKSUM_SUFFIXES.some(suffix => asset.name.endsWith(suffix))
    );
    if (matches.length === 0) {
      continue;
    }
    return matches.find(asset => asset.name.includes('-full')) ?? matches[0] ?? null;
  }
  return null;
}

export class GitHubReleaseInstaller implements IDaemonInstaller {
  private readonly releasesUrl: string;
  private readonly metadataTimeout: number;
  private readonly downloadTimeout: number;
  private readonly userAgent: string;

  constructor(
    private readonly logger: Logger,
    config: GitHubReleaseInstallerConfig = {}
  ) {
    this.releasesUrl = config.releasesUrl || 'https://api.github.com/repos/Spotifyd/spotifyd/releases/latest';
    this.metadataTimeout = config.metadataTimeout || 15000;
    this.downloadTimeout = config.downloadTimeout || 120000;
    this.userAgent = config.userAgent || 'spotify-controller/2.0';
  }

  async install(profile: PlatformProfile, targetPath: string): Promise<Result<string, InstallError>> {
    const candidates = strategyFor(profile).assetCandidates(profile.arch);
    if (candidates.length === 0) {
      this.logger.error({ osKind: profile.osKind, arch: profile.arch }, 'No spotifyd build exists for this platform');
      return { success: false, error: 'UNSUPPORTED_PLATFORM' };
    }

    let assets: ReleaseAsset[];
    try {
      assets = await this.fetchLatestAssets();
    } catch (error) {
      this.logger.error({ err: error }, 'Could not fetch spotifyd release information');
      return { success: false, error: 'DOWNLOAD_FAILED' };
    }

    const asset = selectAsset(assets, candidates);
    if (!asset) {
      this.logger.error({ candidates, available: assets.map(a => a.name) }, 'No release asset matches this platform');
      return { success: false, error: 'UNSUPPORTED_PLATFORM' };
    }

    this.logger.info({ asset: asset.name }, 'Downloading spotifyd');

    let workDir: string | null = null;
    try {
      workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'spotifyd-install-'));
      const archivePath = await this.download(asset, workDir);
      const binaryPath = await this.extractBinary(archivePath, workDir);

      await fs.mkdir(path.dirname(targetPath), { recursive: true });
      await fs.copyFile(binaryPath, targetPath);
      await fs.chmod(targetPath, 0o755);

      this.logger.info({ path: targetPath }, 'spotifyd installed');
      return { success: true, value: targetPath };
    } catch (error) {
      this.logger.error({ err: error, asset: asset.name }, 'spotifyd installation failed');
      return { success: false, error: 'DOWNLOAD_FAILED' };
    } finally {
      if (workDir) {
        await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
          this.logger.warn({ err: error, dir: workDir }, 'Could not remove temporary install directory');
        });
      }
    }
  }

  private async fetchLatestAssets(): Promise<ReleaseAsset[]> {
    const response = await this.request(this.releasesUrl, this.metadataTimeout, 'application/vnd.github+json');

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ReleaseDownloadError('Release information is not JSON', 'INVALID_RESPONSE', response.status, error);
    }

    const parsed = releaseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ReleaseDownloadError('Release information has an unexpected shape', 'INVALID_RESPONSE', response.status, parsed.error);
    }

    this.logger.debug({ tag: parsed.data.tag_name, assets: parsed.data.assets.length }, 'Fetched latest spotifyd release');
    return parsed.data.assets.map(asset => ({ name: asset.name, downloadUrl: asset.browser_download_url }));
  }

  private async download(asset: ReleaseAsset, workDir: string): Promise<string> {
    const response = await this.request(asset.downloadUrl, this.downloadTimeout, 'application/octet-stream');
    const data = Buffer.from(await response.arrayBuffer());
    const filePath = path.join(workDir, path.basename(asset.name));
    await fs.writeFile(filePath, data);
    this.logger.debug({ bytes: data.length, file: filePath }, 'Downloaded release asset');
    return filePath;
  }

  private async extractBinary(archivePath: string, workDir: string): Promise<string> {
    if (!/\.(tar\.gz|tgz)$/.test(archivePath)) {
      this.logger.debug('Release asset is not an archive, treating it as the binary');
      return archivePath;
    }

    const extractDir = path.join(workDir, 'extracted');
    await fs.mkdir(extractDir, { recursive: true });
    try {
      await tar.x({ file: archivePath, cwd: extractDir });
    } catch (error) {
      throw new ReleaseDownloadError('Could not extract the release archive', 'EXTRACTION_FAILED', undefined, error);
    }

    const binaryPath = await findFile(extractDir, DAEMON_BINARY_NAME);
    if (!binaryPath) {
      throw new ReleaseDownloadError(`Archive does not contain a ${DAEMON_BINARY_NAME} binary`, 'EXTRACTION_FAILED');
    }
    return binaryPath;
  }

  /**
   * GET with timeout and status checking
   */
  private async request(url: string, timeout: number, accept: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'Accept': accept,
          'User-Agent': this.userAgent
        },
        signal: controller.signal
      });

      if (!response.ok) {
        throw new ReleaseDownloadError(`GET ${url} returned ${response.status}`, 'HTTP_ERROR', response.status);
      }
      return response;
    } catch (error) {
      if (error instanceof ReleaseDownloadError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ReleaseDownloadError(`GET ${url} timed out after ${timeout}ms`, 'TIMEOUT_ERROR');
      }
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new ReleaseDownloadError(`GET ${url} failed: ${errorMessage}`, 'NETWORK_ERROR', undefined, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function findFile(dir: string, name: string): Promise<string | null> {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isFile() && entry.name === name) {
      return entryPath;
    }
  }

  for (const entry of entries) {
    if (entry.isDirectory()) {
      const found = await findFile(path.join(dir, entry.name), name);
      if (found) {
        return found;
      }
    }
  }

  return null;
}
