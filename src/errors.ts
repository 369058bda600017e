export class ConfigNotFoundError extends Error {
    constructor(readonly configPath: string) {
        super(`Configuration file not found: ${configPath}`);
        this.name = 'ConfigNotFoundError';
    }
}

export class ConfigSyntaxError extends Error {
    constructor(readonly configPath: string, detail: string) {
        super(`Configuration file is malformed: ${configPath} (${detail})`);
        this.name = 'ConfigSyntaxError';
    }
}

export class ConfigValidationError extends Error {
    constructor(readonly configPath: string, readonly issues: string[]) {
        super(`Invalid configuration in ${configPath}:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigValidationError';
    }
}

/**
 * The isolated environment for the recovery tool could not be prepared.
 */
export class RecoverySetupError extends Error {
    constructor(message: string, readonly stderr: string = '') {
        super(message);
        this.name = 'RecoverySetupError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
