/**
 * Tests for the append-only audit log.
 *
 * Source: src/lib/drive-sync/audit-log.ts
 */
import { AuditLog, fromRow, parseRows, serializeRows, toRow } from '@/lib/drive-sync/audit-log'
import type { AuditLogEntry } from '@/lib/drive-sync/types'
import { RunWorkspace } from '@/lib/drive-sync/workspace'
import { MemoryStore } from './fixtures/memory-store'

const HEADER = 'timestamp,src_id,src_title,src_modified,dst_id,dst_title,rows_in,rows_out,status,message'

const okEntry: AuditLogEntry = {
  timestamp: '2026-10-19T12:00:00Z',
  src_id: 'file-1',
  src_title: 'a.csv',
  src_modified: '2026-10-19T10:00:00Z',
  dst_id: 'file-9',
  dst_title: 'a_cleaned.csv',
  rows_in: 3,
  rows_out: 3,
  status: 'ok',
  message: '',
}

const failEntry: AuditLogEntry = {
  timestamp: '2026-10-19T12:00:01Z',
  src_id: 'file-2',
  src_title: 'b.csv',
  src_modified: '2026-10-19T10:30:00Z',
  dst_id: '',
  dst_title: 'b_cleaned.csv',
  rows_in: null,
  rows_out: null,
  status: 'fail',
  message: 'network down, try later',
}

// =========================================================================
// Row conversion
// =========================================================================

describe('row conversion', () => {
  it('renders empty counts as empty cells', () => {
    expect(toRow(failEntry)).toMatchObject({ rows_in: '', rows_out: '', dst_id: '' })
    expect(toRow(okEntry)).toMatchObject({ rows_in: '3', rows_out: '3' })
  })

  it('round-trips entries through rows', () => {
    expect(fromRow(toRow(okEntry))).toEqual(okEntry)
    expect(fromRow(toRow(failEntry))).toEqual(failEntry)
  })

  it('reads float-formatted counts written by older tools', () => {
    expect(fromRow({ ...toRow(okEntry), rows_in: '3.0', rows_out: 'n/a' })).toMatchObject({
      rows_in: 3,
      rows_out: null,
    })
  })

  it('writes the fixed header and quotes messages with commas', () => {
    expect(serializeRows([toRow(failEntry)])).toBe(
      `${HEADER}\n2026-10-19T12:00:01Z,file-2,b.csv,2026-10-19T10:30:00Z,,b_cleaned.csv,,,fail,"network down, try later"`
    )
  })

  it('writes a header-only log without a trailing newline', () => {
    expect(serializeRows([])).toBe(HEADER)
  })

  it('fills cells missing from short rows', () => {
    expect(parseRows('timestamp,src_id,status\n2026-10-19T12:00:00Z,file-1,ok\n')).toEqual([
      {
        timestamp: '2026-10-19T12:00:00Z',
        src_id: 'file-1',
        src_title: '',
        src_modified: '',
        dst_id: '',
        dst_title: '',
        rows_in: '',
        rows_out: '',
        status: 'ok',
        message: '',
      },
    ])
  })
})

// =========================================================================
// Load / append / flush
// =========================================================================

describe('AuditLog', () => {
  let store: MemoryStore
  let workspace: RunWorkspace

  beforeEach(async () => {
    store = new MemoryStore()
    store.addFolder('cleaned')
    workspace = await RunWorkspace.create()
  })

  afterEach(async () => {
    await workspace.dispose()
  })

  it('treats a missing log item as an empty log', async () => {
    const log = new AuditLog(store, workspace)
    await expect(log.load('cleaned')).resolves.toEqual([])
  })

  it('only persists on flush', async () => {
    const log = new AuditLog(store, workspace)
    await log.load('cleaned')
    log.append(okEntry)

    expect(store.item('cleaned', '_pipeline_log.csv')).toBeNull()

    await log.flush('cleaned')
    expect(store.contentOf('cleaned', '_pipeline_log.csv')).toBe(
      `${HEADER}\n2026-10-19T12:00:00Z,file-1,a.csv,2026-10-19T10:00:00Z,file-9,a_cleaned.csv,3,3,ok,`
    )
  })

  it('writes the header even when nothing was appended', async () => {
    const log = new AuditLog(store, workspace)
    await log.load('cleaned')
    await log.flush('cleaned')

    expect(store.contentOf('cleaned', '_pipeline_log.csv')).toBe(HEADER)
  })

  it('keeps earlier entries and appends in order', async () => {
    store.addFile('cleaned', '_pipeline_log.csv', serializeRows([toRow(okEntry)]), '2026-10-18T00:00:00Z')
    const logId = store.item('cleaned', '_pipeline_log.csv')?.id

    const log = new AuditLog(store, workspace)
    await expect(log.load('cleaned')).resolves.toEqual([okEntry])

    log.append(failEntry)
    expect(log.entries()).toEqual([okEntry, failEntry])
    expect(log.appendedEntries()).toEqual([failEntry])

    await expect(log.flush('cleaned')).resolves.toBe(logId)

    const reloaded = new AuditLog(store, workspace)
    await expect(reloaded.load('cleaned')).resolves.toEqual([okEntry, failEntry])
    expect(reloaded.appendedEntries()).toEqual([])
  })

  it('preserves unrecognized history verbatim', async () => {
    const legacy = `${HEADER}\nlast week,file-7,c.csv,,,c_cleaned.csv,,,skipped,manual run`
    store.addFile('cleaned', '_pipeline_log.csv', legacy, '2026-10-18T00:00:00Z')

    const log = new AuditLog(store, workspace)
    await log.load('cleaned')
    await log.flush('cleaned')

    expect(store.contentOf('cleaned', '_pipeline_log.csv')).toBe(legacy)
  })
})
