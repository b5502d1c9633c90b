import { ZapConnectionConfig } from '../../types/config';

/**
 * Validate daemon connection configuration
 */
export function validateConnectionConfig(config: Partial<ZapConnectionConfig>): {
  valid: boolean;
  errors: string[];
} {
  const errors: string[] = [];

  if (!config.zapUrl) {
    errors.push('ZAP URL is required');
  } else if (!isValidUrl(config.zapUrl)) {
    errors.push(`ZAP URL is invalid: ${config.zapUrl}`);
  }

  if (config.port === undefined) {
    errors.push('Port is required');
  } else if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`Port must be an integer between 1 and 65535, got ${config.port}`);
  }

  if (!config.zapPath) {
    errors.push('ZAP path is required');
  } else if (!isValidPath(config.zapPath)) {
    errors.push('ZAP path contains invalid characters');
  }

  if (config.logPath !== undefined && !isValidPath(config.logPath)) {
    errors.push('Log path contains invalid characters');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validate URL format
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return ['http:', 'https:'].includes(parsed.protocol);
  } catch {
    return false;
  }
}

/**
 * Validate regex pattern
 */
export function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate file path
 */
export function isValidPath(path: string): boolean {
  return path.length > 0 && !path.includes('\0');
}
