import type { RemotePackage } from '../core/aur';
import type { PackageDescriptor } from '../core/descriptor';

export type { RemotePackage };

export interface Config {
  suProgram: string;
  autorun: boolean;
  buildDirectory: string;
  logFilename: string;
  logLevel: string;
  reviewBuildScript: boolean;
  aurUrl: string;
}

export interface InstalledRecord {
  name: string;
  installedVersion: string;
}

export interface PackageUpdate {
  name: string;
  installedVersion: string;
  remoteVersion: string;
}

export enum VersionOrder {
  LESS = -1,
  EQUAL = 0,
  GREATER = 1,
}

export type InstallOutcome =
  | 'installed'
  | 'native'
  | 'up-to-date'
  | 'skipped'
  | 'failed';

export interface InstallOptions {
  asDependency?: boolean;
  force?: boolean;
}

export interface NativeGateway {
  isAvailable(name: string): Promise<boolean>;
  installedVersion(name: string): Promise<string | undefined>;
  installFromNative(name: string, asDependency: boolean): Promise<void>;
  remove(name: string): Promise<void>;
  listForeign(): Promise<InstalledRecord[]>;
}

export interface RemoteIndex {
  search(term: string): Promise<RemotePackage[]>;
  batchInfo(names: Iterable<string>): Promise<RemotePackage[]>;
  info(name: string): Promise<RemotePackage | undefined>;
}

export interface BuildOptions {
  asDependency: boolean;
  /** Install even when the same version is already installed. */
  reinstall: boolean;
}

export interface SourceBuilder {
  clone(baseName: string, directory: string): Promise<void>;
  build(
    name: string,
    directory: string,
    options: BuildOptions,
  ): Promise<void>;
}

/**
 * Every point where a run waits on the user. The install and upgrade flows
 * only talk to this interface, never to the terminal.
 */
export interface Decisions {
  confirmNativeInstall(name: string): Promise<boolean>;
  confirmInstall(
    descriptor: PackageDescriptor,
    plan: readonly PackageDescriptor[],
    unresolved: readonly string[],
  ): Promise<boolean>;
  confirmSearchFallback(name: string): Promise<boolean>;
  selectPackage(
    term: string,
    candidates: readonly RemotePackage[],
  ): Promise<string | undefined>;
  reviewBuildScript(name: string, script: string): Promise<boolean>;
  confirmUpgrade(updates: readonly PackageUpdate[]): Promise<boolean>;
}

export interface ProgressReporter {
  start(message: string): void;
  stop(message?: string): void;
}
