import { config } from './config';
import {
  AppConfigSchema,
  type AppConfig,
  type ValidatedConfig,
  type DerivedConfig,
} from './schema';
import { ZodError } from 'zod';

let cachedConfig: ValidatedConfig | null = null;

function computeDerived(validatedConfig: AppConfig): DerivedConfig {
  return {
    workspaceCount: validatedConfig.workspaces.length,
  };
}

export function formatZodError(error: ZodError): string {
  const lines = ['Configuration validation failed:', ''];

  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'root';

    if (issue.code === 'invalid_type') {
      lines.push(
        `  ❌ ${path}:`,
        `     Expected: ${issue.expected}`,
        `     Received: ${issue.received}`,
        ''
      );
    } else if (issue.code === 'unrecognized_keys') {
      lines.push(
        `  ❌ ${path}:`,
        `     Unrecognized keys: ${issue.keys.join(', ')}`,
        `     (This may be a typo or unsupported field)`,
        ''
      );
    } else {
      lines.push(
        `  ❌ ${path}:`,
        `     ${issue.message}`,
        ''
      );
    }
  }

  lines.push('Please fix the configuration and restart the shim.');

  return lines.join('\n');
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return obj;
}

/**
 * Validate a raw config object. Does not touch the cache.
 */
export function loadConfig(input: unknown): ValidatedConfig {
  try {
    const validated = AppConfigSchema.parse(input);

    return deepFreeze({
      ...validated,
      derived: computeDerived(validated),
    });
  } catch (error) {
    if (error instanceof ZodError) {
      console.error(formatZodError(error));
      throw new Error('Configuration validation failed. See error details above.');
    }
    throw error;
  }
}

export function getConfig(): ValidatedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(config);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
