/**
 * AWS profile credential provider.
 *
 * Reads base credentials from the shared configuration files
 * (`~/.aws/credentials` and `~/.aws/config`).
 *
 * @module credentials/profile
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import type { AwsCredentials, CredentialProvider } from './types.js';
import type { Environment } from './environment.js';
import { credentialError, isStsError } from '../error/index.js';

/**
 * Configuration for the profile credential provider.
 */
export interface ProfileConfig {
  /**
   * Name of the profile to use. Defaults to `AWS_PROFILE`, then 'default'.
   */
  profile?: string;

  /**
   * Path to credentials file. Defaults to `AWS_SHARED_CREDENTIALS_FILE`, then ~/.aws/credentials.
   */
  credentialsFile?: string;

  /**
   * Path to config file. Defaults to `AWS_CONFIG_FILE`, then ~/.aws/config.
   */
  configFile?: string;

  /**
   * Environment consulted for the defaults above.
   */
  env?: Environment;
}

type IniSection = Record<string, string>;
type IniData = Record<string, IniSection>;

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse INI file content into sections of key/value pairs.
 */
export function parseIni(content: string): IniData {
  const result: IniData = {};
  let current: IniSection | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    const sectionMatch = line.match(/^\[([^\]]+)\]$/);
    if (sectionMatch?.[1] !== undefined) {
      current = {};
      result[sectionMatch[1].trim()] = current;
      continue;
    }

    const kvMatch = line.match(/^([^=]+)=(.*)$/);
    if (current && kvMatch?.[1] !== undefined && kvMatch[2] !== undefined) {
      current[kvMatch[1].trim()] = kvMatch[2].trim();
    }
  }

  return result;
}

/**
 * Provider that retrieves base credentials from a named profile.
 *
 * The credentials file is tried first, then the config file, where named
 * profiles live under `[profile <name>]`. A config profile with
 * `source_profile` takes its keys from the source profile.
 *
 * @example
 * ```typescript
 * const provider = new ProfileCredentialProvider({ profile: 'production' });
 * const credentials = await provider.getCredentials();
 * ```
 */
export class ProfileCredentialProvider implements CredentialProvider {
  readonly profile: string;
  private readonly credentialsFile: string;
  private readonly configFile: string;

  constructor(config: ProfileConfig = {}) {
    const env = config.env ?? process.env;

    this.profile = config.profile || env['AWS_PROFILE'] || 'default';

    this.credentialsFile =
      config.credentialsFile ||
      env['AWS_SHARED_CREDENTIALS_FILE'] ||
      join(homedir(), '.aws', 'credentials');

    this.configFile =
      config.configFile || env['AWS_CONFIG_FILE'] || join(homedir(), '.aws', 'config');
  }

  /**
   * @throws {StsError} With code `CREDENTIAL` if the profile is missing or holds no keys
   */
  public async getCredentials(): Promise<AwsCredentials> {
    try {
      const credentials =
        (await this.loadFromCredentialsFile()) ?? (await this.loadFromConfigFile());
      if (credentials) {
        return credentials;
      }
    } catch (error) {
      if (isStsError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw credentialError(`Failed to load profile '${this.profile}': ${reason}`);
    }

    throw credentialError(`Profile '${this.profile}' not found or does not contain credentials`);
  }

  public isExpired(): boolean {
    return false;
  }

  private async readIni(path: string): Promise<IniData | undefined> {
    try {
      return parseIni(await readFile(path, 'utf-8'));
    } catch (error) {
      if (isFileNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async loadFromCredentialsFile(): Promise<AwsCredentials | undefined> {
    const ini = await this.readIni(this.credentialsFile);
    const section = ini?.[this.profile];
    return section ? extractCredentials(section) : undefined;
  }

  private async loadFromConfigFile(): Promise<AwsCredentials | undefined> {
    const ini = await this.readIni(this.configFile);
    const section = ini?.[configSectionName(this.profile)];
    if (!ini || !section) {
      return undefined;
    }

    const sourceProfile = section['source_profile'];
    if (sourceProfile) {
      return this.loadSourceProfile(sourceProfile, ini);
    }

    return extractCredentials(section);
  }

  private async loadSourceProfile(
    sourceProfile: string,
    configIni: IniData
  ): Promise<AwsCredentials | undefined> {
    const configSection = configIni[configSectionName(sourceProfile)];
    const fromConfig = configSection ? extractCredentials(configSection) : undefined;
    if (fromConfig) {
      return fromConfig;
    }

    const credentialsSection = (await this.readIni(this.credentialsFile))?.[sourceProfile];
    return credentialsSection ? extractCredentials(credentialsSection) : undefined;
  }
}

function configSectionName(profile: string): string {
  return profile === 'default' ? 'default' : `profile ${profile}`;
}

function extractCredentials(section: IniSection): AwsCredentials | undefined {
  const accessKeyId = section['aws_access_key_id'];
  const secretAccessKey = section['aws_secret_access_key'];
  const sessionToken = section['aws_session_token'];

  if (!accessKeyId || !secretAccessKey) {
    return undefined;
  }

  return sessionToken
    ? { accessKeyId, secretAccessKey, sessionToken }
    : { accessKeyId, secretAccessKey };
}
