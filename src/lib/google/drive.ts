import { Readable } from 'node:stream'
import { types } from 'node:util'
import { google, type drive_v3 } from 'googleapis'
import { DRIVE } from '@/lib/constants'
import { AuthError, DownloadError, toErrorMessage } from '@/lib/drive-sync/errors'
import type { ListFilter, RemoteFileStore, RemoteItem } from '@/lib/drive-sync/types'

/**
 * Escape single quotes for Google Drive API query strings
 * Google Drive uses single quotes for string literals, so we need to escape them
 */
export function escapeQueryString(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "\\'")
}

/**
 * Build a files.list query for the non-trashed children of a folder
 */
export function buildChildrenQuery(containerId: string, filter: ListFilter = {}): string {
  const clauses = [`'${escapeQueryString(containerId)}' in parents`, 'trashed=false']
  if (filter.mimeType) clauses.push(`mimeType='${escapeQueryString(filter.mimeType)}'`)
  if (filter.name) clauses.push(`name='${escapeQueryString(filter.name)}'`)
  return clauses.join(' and ')
}

function toRemoteItem(file: drive_v3.Schema$File): RemoteItem | null {
  if (!file.id || !file.name) return null
  return {
    id: file.id,
    title: file.name,
    modifiedTime: file.modifiedTime ?? null,
    mimeType: file.mimeType ?? '',
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data
  if (types.isAnyArrayBuffer(data)) return Buffer.from(data)
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
  if (typeof data === 'string') return Buffer.from(data)
  throw new DownloadError('Drive returned no file content')
}

/**
 * RemoteFileStore backed by the Google Drive v3 API
 */
export class GoogleDriveStore implements RemoteFileStore {
  constructor(private readonly drive: drive_v3.Drive) {}

  async listChildren(containerId: string, filter?: ListFilter): Promise<RemoteItem[]> {
    const items: RemoteItem[] = []
    let pageToken: string | undefined

    do {
      const response = await this.drive.files.list({
        q: buildChildrenQuery(containerId, filter),
        fields: 'nextPageToken, files(id, name, modifiedTime, mimeType)',
        pageSize: DRIVE.PAGE_SIZE,
        pageToken,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      })

      for (const file of response.data.files ?? []) {
        const item = toRemoteItem(file)
        if (item) items.push(item)
      }
      pageToken = response.data.nextPageToken ?? undefined
    } while (pageToken)

    return items
  }

  async findByName(containerId: string, title: string): Promise<RemoteItem | null> {
    const [first] = await this.listChildren(containerId, { name: title })
    return first ?? null
  }

  async ensureSubfolder(containerId: string, name: string): Promise<string> {
    const [existing] = await this.listChildren(containerId, {
      name,
      mimeType: DRIVE.FOLDER_MIME_TYPE,
    })
    if (existing) return existing.id

    const response = await this.drive.files.create({
      requestBody: {
        name,
        mimeType: DRIVE.FOLDER_MIME_TYPE,
        parents: [containerId],
      },
      fields: 'id',
      supportsAllDrives: true,
    })

    if (!response.data.id) {
      throw new Error(`Drive did not return an id for folder '${name}'`)
    }
    return response.data.id
  }

  async download(item: RemoteItem): Promise<Buffer> {
    const response = await this.drive.files.get(
      { fileId: item.id, alt: 'media', supportsAllDrives: true },
      { responseType: 'arraybuffer' }
    )
    return toBuffer(response.data)
  }

  async create(containerId: string, title: string, content: Buffer): Promise<string> {
    const response = await this.drive.files.create({
      requestBody: { name: title, parents: [containerId] },
      media: { mimeType: DRIVE.CSV_MIME_TYPE, body: Readable.from(content) },
      fields: 'id',
      supportsAllDrives: true,
    })

    if (!response.data.id) {
      throw new Error(`Drive did not return an id for '${title}'`)
    }
    return response.data.id
  }

  async overwrite(itemId: string, content: Buffer): Promise<string> {
    const response = await this.drive.files.update({
      fileId: itemId,
      media: { mimeType: DRIVE.CSV_MIME_TYPE, body: Readable.from(content) },
      fields: 'id',
      supportsAllDrives: true,
    })
    return response.data.id ?? itemId
  }
}

/**
 * Authenticate with a service-account key file and return a Drive-backed
 * store. Credentials are exercised up front so a bad key fails the run
 * before any file is touched.
 */
export async function connectDrive(credentialsPath: string): Promise<GoogleDriveStore> {
  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsPath,
    scopes: [...DRIVE.SCOPES],
  })

  try {
    await auth.getAccessToken()
  } catch (error) {
    throw new AuthError(
      `Could not authenticate with credentials '${credentialsPath}': ${toErrorMessage(error)}`,
      { cause: error }
    )
  }

  return new GoogleDriveStore(google.drive({ version: 'v3', auth }))
}
