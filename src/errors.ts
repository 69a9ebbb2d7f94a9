class AurstepError extends Error {
    readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

class RemoteConnectionError extends AurstepError {
    readonly status: number | undefined;

    constructor(message: string, status?: number) {
        super(message, 'REMOTE_CONNECTION');
        this.status = status;
    }
}

class PackageNotFoundError extends AurstepError {
    readonly packageName: string;

    constructor(packageName: string) {
        super(`Package ${packageName} not found.`, 'PACKAGE_NOT_FOUND');
        this.packageName = packageName;
    }
}

class VersionParseError extends AurstepError {
    readonly version: string;

    constructor(version: string) {
        super(`Can not parse version string "${version}".`, 'VERSION_PARSE');
        this.version = version;
    }
}

class NativeInstallError extends AurstepError {
    constructor(packageName: string, exitCode: number | null) {
        super(
            `Error installing ${packageName} from pacman (exit code ${exitCode}).`,
            'NATIVE_INSTALL',
        );
    }
}

class RemoveError extends AurstepError {
    constructor(packageName: string, exitCode: number | null) {
        super(
            `Error removing ${packageName} (exit code ${exitCode}).`,
            'REMOVE',
        );
    }
}

class CloneError extends AurstepError {
    constructor(packageName: string, reason: string) {
        super(`Could not clone ${packageName}: ${reason}`, 'CLONE');
    }
}

class BuildError extends AurstepError {
    constructor(packageName: string, exitCode: number | null) {
        super(
            `Failed to build package ${packageName} (exit code ${exitCode}).`,
            'BUILD',
        );
    }
}

class DependencyCycleError extends AurstepError {
    readonly cycle: readonly string[];

    constructor(cycle: readonly string[]) {
        super(`Dependency cycle detected: ${cycle.join(' -> ')}`, 'DEPENDENCY_CYCLE');
        this.cycle = cycle;
    }
}

class InstallDeclinedError extends AurstepError {
    readonly packageName: string;

    constructor(packageName: string) {
        super(`Installation of ${packageName} was declined.`, 'DECLINED');
        this.packageName = packageName;
    }
}

class ConfigError extends AurstepError {
    constructor(message: string) {
        super(message, 'CONFIG');
    }
}

// Outside the AurstepError hierarchy; ends the whole run with "Aborted."
class UserCancelledError extends Error {
    constructor(message = 'Operation cancelled.') {
        super(message);
        this.name = 'UserCancelledError';
    }
}

const errorMessage = (err: unknown): string =>
    err instanceof Error ? err.message : String(err);

export {
    AurstepError,
    RemoteConnectionError,
    PackageNotFoundError,
    VersionParseError,
    NativeInstallError,
    RemoveError,
    CloneError,
    BuildError,
    DependencyCycleError,
    InstallDeclinedError,
    ConfigError,
    UserCancelledError,
    errorMessage,
};
