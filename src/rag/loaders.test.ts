import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { InvalidArgumentError, IOFailureError } from '../core/errors.js'
import { loadDocuments, parseJson, parseMarkdown, splitDocuments } from './loaders.js'

describe('parseMarkdown', () => {
  it('moves front-matter into metadata and takes the first heading as title', () => {
    const doc = parseMarkdown('guide.md', '---\nauthor: Ada\ntags: memory, recall\n---\n# Getting started\n\nInstall it.\n')
    expect(doc.content).toBe('# Getting started\n\nInstall it.')
    expect(doc.metadata).toEqual({
      type: 'markdown',
      file_name: 'guide.md',
      author: 'Ada',
      tags: 'memory, recall',
      title: 'Getting started',
    })
  })

  it('leaves documents without front-matter untouched', () => {
    const doc = parseMarkdown('notes.md', 'plain text\n## not a title')
    expect(doc.content).toBe('plain text\n## not a title')
    expect(doc.metadata.title).toBeUndefined()
  })
})

describe('parseJson', () => {
  it('reads strings and objects with content or text fields', () => {
    const docs = parseJson('data.json', JSON.stringify([
      { content: 'alpha', author: 'x', nested: { a: 1 } },
      'beta',
      { text: 'gamma' },
      { other: 1 },
    ]))
    expect(docs.map(d => d.content)).toEqual(['alpha', 'beta', 'gamma'])
    expect(docs[0].metadata).toEqual({ type: 'json', file_name: 'data.json', item_index: 0, author: 'x' })
    expect(docs[2].metadata.item_index).toBe(2)
  })

  it('accepts a single object', () => {
    expect(parseJson('one.json', '{"text":"solo"}').map(d => d.content)).toEqual(['solo'])
  })

  it('rejects invalid JSON', () => {
    expect(() => parseJson('bad.json', '{')).toThrow(InvalidArgumentError)
  })

  it('rejects arrays of numbers', () => {
    expect(() => parseJson('nums.json', '[1, 2]')).toThrow(InvalidArgumentError)
  })
})

describe('loadDocuments', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'agent-recall-loaders-'))
    writeFileSync(join(dir, 'a.txt'), 'plain file')
    writeFileSync(join(dir, 'b.md'), '# Bee\nbuzz')
    writeFileSync(join(dir, 'skip.csv'), 'x,y')
    mkdirSync(join(dir, 'sub'))
    writeFileSync(join(dir, 'sub', 'c.json'), '["see"]')
    mkdirSync(join(dir, 'node_modules'))
    writeFileSync(join(dir, 'node_modules', 'dep.txt'), 'ignored')
    mkdirSync(join(dir, '.cache'))
    writeFileSync(join(dir, '.cache', 'hidden.txt'), 'ignored')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('detects the format from the extension', async () => {
    const [doc] = await loadDocuments(join(dir, 'b.md'))
    expect(doc.metadata.title).toBe('Bee')
    expect(doc.source).toBe(join(dir, 'b.md'))
  })

  it('reads any file as text when asked', async () => {
    const docs = await loadDocuments(join(dir, 'skip.csv'), 'text')
    expect(docs).toEqual([{ content: 'x,y', source: join(dir, 'skip.csv'), metadata: { type: 'text', file_name: 'skip.csv' } }])
  })

  it('walks directories, skipping node_modules, dot-directories and unknown extensions', async () => {
    const docs = await loadDocuments(dir)
    expect(docs.map(d => d.source)).toEqual([
      join(dir, 'a.txt'),
      join(dir, 'b.md'),
      join(dir, 'sub', 'c.json'),
    ])
    expect(docs.map(d => d.content)).toEqual(['plain file', '# Bee\nbuzz', 'see'])
  })

  it('stops between files once the signal is aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    await expect(loadDocuments(dir, 'directory', { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' })
  })

  it('reports missing files as IO failures', async () => {
    await expect(loadDocuments(join(dir, 'missing.txt'))).rejects.toThrow(IOFailureError)
    await expect(loadDocuments(join(dir, 'missing.txt'), 'text')).rejects.toThrow(IOFailureError)
  })
})

describe('splitDocuments', () => {
  const doc = { content: 'abcdefghij', source: 'letters', metadata: { lang: 'en' } }

  it('slides overlapping windows across long documents', () => {
    const chunks = splitDocuments([doc], 4, 1)
    expect(chunks.map(c => c.content)).toEqual(['abcd', 'defg', 'ghij'])
    expect(chunks[1].metadata).toEqual({ lang: 'en', chunk_index: 1, start: 3, end: 7 })
    expect(chunks.every(c => c.source === 'letters')).toBe(true)
  })

  it('keeps short documents whole', () => {
    const chunks = splitDocuments([{ ...doc, content: 'abc' }], 4, 1)
    expect(chunks).toHaveLength(1)
    expect(chunks[0].metadata).toEqual({ lang: 'en', chunk_index: 0, start: 0, end: 3 })
  })

  it('never cuts a surrogate pair in half', () => {
    const end = splitDocuments([{ ...doc, content: 'ab\u{1F600}cd' }], 3, 0)
    expect(end.map(c => c.content)).toEqual(['ab', '\u{1F600}c', 'd'])
    expect(end[1].metadata).toEqual({ lang: 'en', chunk_index: 1, start: 2, end: 5 })

    const start = splitDocuments([{ ...doc, content: 'a\u{1F600}bcd' }], 3, 1)
    expect(start.map(c => c.content)).toEqual(['a\u{1F600}', '\u{1F600}b', 'bcd'])
  })

  it('drops empty documents', () => {
    expect(splitDocuments([{ ...doc, content: '' }], 4, 0)).toEqual([])
  })

  it('rejects invalid sizes', () => {
    expect(() => splitDocuments([doc], 0, 0)).toThrow(InvalidArgumentError)
    expect(() => splitDocuments([doc], 4, 4)).toThrow(InvalidArgumentError)
    expect(() => splitDocuments([doc], 4, -1)).toThrow(InvalidArgumentError)
  })
})
