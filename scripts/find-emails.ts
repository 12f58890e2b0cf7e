/**
 * Find verified emails from the command line
 *
 * Single contact:
 *   npx tsx scripts/find-emails.ts --first=John --last=Smith --company=acme.com
 *
 * CSV batch (columns detected automatically, or forced with --col-*):
 *   npx tsx scripts/find-emails.ts contacts.csv [--out=results.csv] [--concurrency=2]
 *     [--found-only] [--dry-run] [--col-first=First] [--col-last=Last] [--col-company=Website]
 *
 * --dry-run prints the candidates that would be probed without calling the provider.
 */

import 'dotenv/config';
import * as fs from 'fs';
import {
  findEmail,
  findEmailsBatch,
  generateEmails,
  getDefaultOracle,
  normalizeDomain,
  normalizeName,
  type ContactInput,
} from '../src/lib/email/finder';
import { outcomesToCsv, parseContactsCsv } from '../src/lib/contacts';

function getArg(args: string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function printCandidates(contact: ContactInput) {
  const name = normalizeName(`${contact.firstName} ${contact.lastName}`);
  const domain = normalizeDomain(contact.companyUrl);

  if (!domain) {
    console.log(`  ✗ ${contact.firstName} ${contact.lastName}: invalid company URL "${contact.companyUrl}"`);
    return;
  }
  if (!name) {
    console.log(`  ✗ ${contact.firstName} ${contact.lastName}: name has no letters`);
    return;
  }

  const emails = generateEmails({ ...name, domain });
  console.log(`  ${contact.firstName} ${contact.lastName} (${domain}) - ${emails.length} candidates`);
  for (const email of emails) {
    console.log(`    [DRY] Would test: ${email}`);
  }
}

async function runSingle(contact: ContactInput, dryRun: boolean) {
  console.log(`=== EMAIL LOOKUP ${dryRun ? '(DRY RUN)' : ''} ===\n`);

  if (dryRun) {
    printCandidates(contact);
    return;
  }

  const outcome = await findEmail(contact, getDefaultOracle());

  for (const [i, email] of outcome.candidatesTried.entries()) {
    console.log(`  ${i + 1}. ${email}`);
  }

  if (outcome.email) {
    console.log(`\n  ✓ FOUND: ${outcome.email} (${outcome.status}, attempt ${outcome.attemptIndex}/${outcome.candidatesTotal})`);
  } else {
    console.log(`\n  ✗ ${outcome.status} after ${outcome.candidatesTried.length} of ${outcome.candidatesTotal} candidates`);
  }
}

async function runBatch(file: string, args: string[]) {
  const dryRun = args.includes('--dry-run');
  const foundOnly = args.includes('--found-only');
  const out = getArg(args, 'out');
  const concurrencyArg = getArg(args, 'concurrency');

  console.log(`=== BATCH EMAIL LOOKUP ${dryRun ? '(DRY RUN)' : ''} ===\n`);

  const sheet = parseContactsCsv(fs.readFileSync(file, 'utf8'), {
    firstname: getArg(args, 'col-first'),
    lastname: getArg(args, 'col-last'),
    companyUrl: getArg(args, 'col-company'),
  });

  console.log(`Columns: ${JSON.stringify(sheet.columns)}`);
  console.log(`Rows: ${sheet.totalRows}, usable: ${sheet.contacts.length}, skipped: ${sheet.skipped.length}`);
  for (const skipped of sheet.skipped) {
    console.log(`  - row ${skipped.row} skipped (missing ${skipped.missing.join(', ')})`);
  }
  console.log('');

  if (dryRun) {
    sheet.contacts.forEach(printCandidates);
    return;
  }

  const { outcomes, summary } = await findEmailsBatch(sheet.contacts, getDefaultOracle(), {
    concurrency: concurrencyArg ? parseInt(concurrencyArg, 10) : undefined,
    onProgress: ({ completed, total, outcome }) => {
      const label = `${outcome.fullName} (${outcome.domain || 'no domain'})`;
      if (outcome.email) {
        console.log(`[${completed}/${total}] ✓ ${label}: ${outcome.email} (attempt ${outcome.attemptIndex})`);
      } else {
        console.log(`[${completed}/${total}] ✗ ${label}: ${outcome.status}`);
      }
    },
  });

  console.log(`\n=== SUMMARY ===`);
  console.log(`Processed: ${summary.totalRows}`);
  console.log(`Emails found: ${summary.found} (${summary.successRate}%)`);
  console.log(`Not found: ${summary.notFound}, invalid input: ${summary.invalid}`);
  console.log(`API calls: ${summary.totalOracleCalls} (avg ${summary.avgCallsPerPerson} per person)`);
  console.log(`First attempt success: ${summary.firstAttemptSuccessRate}%`);
  console.log(`Calls saved by early stopping: ${summary.callsSaved} (${summary.savedPercent}%)`);
  for (const [attempt, count] of Object.entries(summary.attemptsHistogram)) {
    console.log(`  Attempt ${attempt}: ${count} emails`);
  }

  if (out) {
    fs.writeFileSync(out, outcomesToCsv(outcomes, { foundOnly }));
    console.log(`\nResults written to ${out}`);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const file = args.find(a => !a.startsWith('--'));

  if (file) {
    await runBatch(file, args);
    return;
  }

  const firstName = getArg(args, 'first');
  const lastName = getArg(args, 'last');
  const companyUrl = getArg(args, 'company');

  if (!firstName || !lastName || !companyUrl) {
    console.error('Usage: find-emails.ts --first=<name> --last=<name> --company=<url>');
    console.error('   or: find-emails.ts <contacts.csv> [--out=results.csv] [--dry-run]');
    process.exit(1);
  }

  await runSingle({ firstName, lastName, companyUrl }, args.includes('--dry-run'));
}

main().catch(error => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
