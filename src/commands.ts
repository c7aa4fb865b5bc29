import { EmailAddress } from './address.js';
import { describeError, type ErrorKind } from './errors.js';
import { parseDomain, parseLocalPart } from './parser.js';
import { fileExists, readAddressList } from './util/fs.js';
import type { OutputFormat } from './util/env.js';
import { logger, type Logger } from './util/logger.js';

export type CheckReport =
  | { input: string; valid: true; local: string; domain: string; uri: string }
  | { input: string; valid: false; error: ErrorKind; message: string };

export type CheckOptions = {
  file?: string;
  format: OutputFormat;
};

export type PartKind = 'local' | 'domain';

export function checkAddress(input: string): CheckReport {
  const result = EmailAddress.validate(input);
  if (!result.ok) {
    return { input, valid: false, error: result.error, message: describeError(result.error) };
  }
  const { local, domain } = result.value;
  return { input, valid: true, local, domain, uri: result.value.toUri() };
}

async function collectAddresses(addresses: readonly string[], file?: string): Promise<string[]> {
  const collected = [...addresses];
  if (file) {
    if (!(await fileExists(file))) {
      throw new Error(`Address list not found: ${file}`);
    }
    collected.push(...(await readAddressList(file)));
  }
  return collected;
}

/**
 * Validates every address given on the command line or in the list file and
 * prints one verdict per address.
 *
 * @returns true when every address is valid
 */
export async function runCheck(
  addresses: readonly string[],
  options: CheckOptions,
  log: Logger = logger,
): Promise<boolean> {
  const inputs = await collectAddresses(addresses, options.file);
  if (inputs.length === 0) {
    throw new Error('No addresses given. Pass them as arguments or with --file.');
  }

  const reports = inputs.map(checkAddress);
  const invalid = reports.filter((report) => !report.valid).length;

  if (options.format === 'json') {
    console.log(JSON.stringify(reports, null, 2));
    return invalid === 0;
  }

  for (const report of reports) {
    if (report.valid) {
      log.info(`✅ ${report.input}`);
      log.debug(`local-part ${report.local}, domain ${report.domain}`);
    } else {
      log.info(`❌ ${report.input} (${report.error}: ${report.message})`);
    }
  }

  if (invalid > 0) {
    log.warn(`${invalid} of ${reports.length} addresses are invalid.`);
  } else {
    log.success(`All ${reports.length} addresses are valid.`);
  }
  return invalid === 0;
}

/**
 * Validates a lone local-part or domain.
 *
 * @returns true when the part is valid
 */
export function runPartCheck(kind: PartKind, part: string, log: Logger = logger): boolean {
  const result = kind === 'local' ? parseLocalPart(part) : parseDomain(part);
  const label = kind === 'local' ? 'local-part' : 'domain';
  if (result.ok) {
    log.info(`✅ ${part} is a valid ${label}`);
    return true;
  }
  log.info(`❌ ${part} is not a valid ${label} (${result.error}: ${describeError(result.error)})`);
  return false;
}

/** Prints the `mailto:` URI of an address. */
export function runUri(address: string): void {
  console.log(EmailAddress.parse(address).toUri());
}

/** Prints `Name <address>`. */
export function runDisplay(address: string, displayName: string): void {
  console.log(EmailAddress.parse(address).toDisplay(displayName));
}
