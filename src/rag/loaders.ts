import type { Dirent } from 'fs'
import { readdir, readFile, stat } from 'fs/promises'
import { basename, extname, join } from 'path'
import { z } from 'zod'
import { InvalidArgumentError, IOFailureError } from '../core/errors.js'
import { formatIssues } from '../core/events.js'
import type { Document } from '../core/types.js'
import { logger } from '../utils/logger.js'

const log = logger.child('loaders')

export type DocumentFormat = 'auto' | 'text' | 'markdown' | 'json' | 'directory'

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['auto', 'text', 'markdown', 'json', 'directory']

export interface LoadOptions {
  signal?: AbortSignal
}

const LOADABLE_EXTENSIONS = new Set(['.txt', '.md', '.markdown', '.json'])
const SKIPPED_DIRECTORIES = new Set(['node_modules'])

const jsonItemSchema = z.union([z.string(), z.record(z.unknown())])
const jsonFileSchema = z.union([z.array(jsonItemSchema), jsonItemSchema])

export function isDocumentFormat(value: string): value is DocumentFormat {
  return (DOCUMENT_FORMATS as readonly string[]).includes(value)
}

export async function loadDocuments(
  path: string,
  format: DocumentFormat = 'auto',
  options: LoadOptions = {},
): Promise<Document[]> {
  const resolved = format === 'auto' ? await detectFormat(path) : format
  switch (resolved) {
    case 'directory':
      return loadDirectory(path, options)
    case 'markdown':
      return [parseMarkdown(path, await readText(path))]
    case 'json':
      return parseJson(path, await readText(path))
    case 'text':
    case 'auto':
      return [{ content: await readText(path), source: path, metadata: { type: 'text', file_name: basename(path) } }]
  }
}

async function detectFormat(path: string): Promise<DocumentFormat> {
  let isDirectory: boolean
  try {
    isDirectory = (await stat(path)).isDirectory()
  } catch (err) {
    throw new IOFailureError(`Cannot read ${path}`, err)
  }
  if (isDirectory) return 'directory'
  return formatForExtension(extname(path).toLowerCase())
}

function formatForExtension(ext: string): DocumentFormat {
  if (ext === '.md' || ext === '.markdown') return 'markdown'
  if (ext === '.json') return 'json'
  return 'text'
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    throw new IOFailureError(`Failed to read ${path}`, err)
  }
}

/** Front-matter lines become string metadata; the title comes from the first `#` heading. */
export function parseMarkdown(source: string, text: string): Document {
  const metadata: Record<string, unknown> = { type: 'markdown', file_name: basename(source) }
  let body = text

  const frontMatter = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/.exec(text)
  if (frontMatter) {
    for (const line of frontMatter[1].split(/\r?\n/)) {
      const colon = line.indexOf(':')
      if (colon <= 0) continue
      const key = line.slice(0, colon).trim()
      const value = line.slice(colon + 1).trim()
      if (key) metadata[key] = value
    }
    body = text.slice(frontMatter[0].length)
  }

  const heading = /^#\s+(.+?)\s*$/m.exec(body)
  if (heading) metadata.title = heading[1]

  return { content: body.trim(), source, metadata }
}

/** Strings are taken as content; objects give their `content` or `text` field and keep scalar fields as metadata. */
export function parseJson(source: string, text: string): Document[] {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new InvalidArgumentError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  const result = jsonFileSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidArgumentError(`${source} must hold strings or objects: ${formatIssues(result.error)}`)
  }

  const items = Array.isArray(result.data) ? result.data : [result.data]
  const documents: Document[] = []
  items.forEach((item, index) => {
    const base = { type: 'json', file_name: basename(source), item_index: index }
    if (typeof item === 'string') {
      if (item.trim()) documents.push({ content: item, source, metadata: base })
      return
    }

    const { content, text: textField, ...rest } = item
    const body = typeof content === 'string' ? content : typeof textField === 'string' ? textField : null
    if (body === null) {
      log.warn(`Skipping item ${index} in ${source}: no content or text field`)
      return
    }
    const metadata: Record<string, unknown> = { ...base }
    for (const [key, value] of Object.entries(rest)) {
      if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) metadata[key] = value
    }
    if (body.trim()) documents.push({ content: body, source, metadata })
  })
  return documents
}

async function loadDirectory(root: string, options: LoadOptions): Promise<Document[]> {
  const files = await collectFiles(root)
  const documents: Document[] = []
  for (const file of files) {
    options.signal?.throwIfAborted()
    const text = await readText(file)
    const format = formatForExtension(extname(file).toLowerCase())
    if (format === 'markdown') documents.push(parseMarkdown(file, text))
    else if (format === 'json') documents.push(...parseJson(file, text))
    else documents.push({ content: text, source: file, metadata: { type: 'text', file_name: basename(file) } })
  }
  log.info(`Loaded ${documents.length} documents from ${files.length} files under ${root}`)
  return documents
}

async function collectFiles(dir: string): Promise<string[]> {
  let entries: Dirent[]
  try {
    entries = await readdir(dir, { withFileTypes: true })
  } catch (err) {
    throw new IOFailureError(`Failed to list ${dir}`, err)
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  const files: string[] = []
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const full = join(dir, entry.name)
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) files.push(...(await collectFiles(full)))
    } else if (entry.isFile() && LOADABLE_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      files.push(full)
    }
  }
  return files
}

/** True when index `i` falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, i: number): boolean {
  if (i <= 0 || i >= text.length) return false
  const high = text.charCodeAt(i - 1)
  const low = text.charCodeAt(i)
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff
}

/**
 * Splits each document into windows of `chunkSize` UTF-16 units, each starting
 * `chunkSize - chunkOverlap` after the previous. Documents that fit are kept
 * as a single chunk. A boundary that would split a surrogate pair moves back
 * by one unit.
 */
export function splitDocuments(documents: Document[], chunkSize: number, chunkOverlap: number): Document[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${chunkSize}`)
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new InvalidArgumentError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`)
  }

  const chunks: Document[] = []
  for (const doc of documents) {
    const text = doc.content
    const length = text.length
    if (length === 0) continue
    let start = 0
    let index = 0
    for (;;) {
      let end = Math.min(start + chunkSize, length)
      if (end - 1 > start && splitsSurrogatePair(text, end)) end--
      chunks.push({
        content: text.slice(start, end),
        source: doc.source,
        metadata: { ...doc.metadata, chunk_index: index, start, end },
      })
      if (end >= length) break
      let next = end - chunkOverlap
      if (splitsSurrogatePair(text, next)) next--
      start = next > start ? next : end
      index++
    }
  }
  return chunks
}
