/**
 * CLI Version Information
 *
 * Should match package.json version.
 *
 * @module cli/version
 */

export const VERSION = '0.1.0';

export function getVersionInfo(): string {
  return `stagecraft v${VERSION}`;
}
