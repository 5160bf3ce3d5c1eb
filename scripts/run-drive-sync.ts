#!/usr/bin/env node
// Run with: npx tsx scripts/run-drive-sync.ts --folder-id <id>
// Cleans new or changed CSV files in a Drive folder into its data_cleaned subfolder

import { program } from 'commander'
import { SyncOrchestrator, formatSummary, mapPipelineError, resolveTimezone } from '@/lib/drive-sync'
import { connectDrive } from '@/lib/google/drive'
import { logger } from '@/lib/logger'
import { SyncCommandSchema, type SyncCommandInput } from '@/lib/validations/schemas'

const log = logger.child('cli')

async function runDriveSync(input: SyncCommandInput): Promise<number> {
  const parsed = SyncCommandSchema.safeParse(input)
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      log.error(`Invalid option ${issue.path.join('.')}: ${issue.message}`)
    }
    return 1
  }

  const options = parsed.data
  const timezone = resolveTimezone(options.tz)
  if (timezone !== options.tz) {
    log.warn(`Unknown timezone '${options.tz}', using UTC`)
  }

  try {
    const store = await connectDrive(options.credentials)
    const { summary } = await new SyncOrchestrator({ store }).run({
      rootId: options.folderId,
      runTodayOnly: options.runTodayOnly,
      timezone,
    })

    console.log(`\nSummary → ${formatSummary(summary)}`)
    return 0
  } catch (error) {
    const { exitCode, message } = mapPipelineError(error)
    log.error(message)
    return exitCode
  }
}

program
  .name('drive-sync')
  .description('Clean CSV files from a Google Drive folder into its data_cleaned subfolder')
  .option('--folder-id <id>', 'Root Drive folder ID', process.env.DRIVE_SYNC_FOLDER_ID)
  .option('--credentials <path>', 'Service account key file', process.env.GOOGLE_APPLICATION_CREDENTIALS)
  .option('--run-today-only <bool>', 'Only process files modified today (true/false)', process.env.DRIVE_SYNC_RUN_TODAY_ONLY)
  .option('--tz <zone>', 'Timezone used for "today"', process.env.DRIVE_SYNC_TZ)
  .action(async (opts: { folderId?: string; credentials?: string; runTodayOnly?: string; tz?: string }) => {
    process.exitCode = await runDriveSync({
      folderId: opts.folderId ?? '',
      credentials: opts.credentials,
      runTodayOnly: opts.runTodayOnly,
      tz: opts.tz,
    })
  })

program.parseAsync().catch((error: unknown) => {
  log.error('Unexpected failure', error)
  process.exitCode = 1
})
