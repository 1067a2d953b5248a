import { describe, it, expect } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Writable } from 'node:stream'
import {
  CSV_COLUMNS,
  CsvSink,
  JsonArraySink,
  MemorySink,
  NdjsonSink,
  createSink,
  fileTarget,
  flattenRecord,
  streamTarget,
  type TextTarget,
} from '../sinks.js'
import type { ListingRecord } from '../../crawler/types.js'

function memoryTarget() {
  const chunks: string[] = []
  let ended = false
  const target: TextTarget = {
    write: async chunk => {
      chunks.push(chunk)
    },
    end: async () => {
      ended = true
    },
  }
  return { target, text: () => chunks.join(''), ended: () => ended }
}

function listing(id: string): ListingRecord {
  return {
    id,
    title: 'BMW X5',
    url: `https://www.example.com/offers/${id}`,
    price: { display: '€ 31,980', rawPrice: 31980, currency: 'EUR' },
    comfort: ['Air conditioning', 'Heated seats'],
    media: [],
    safety: [],
    extras: [],
    images: ['https://img.example.com/1.jpg'],
  }
}

function blanks(count: number): string[] {
  return Array.from({ length: count }, () => '')
}

describe('JsonArraySink', () => {
  it('writes one JSON array on close', async () => {
    const out = memoryTarget()
    const sink = new JsonArraySink(out.target)

    sink.emit(listing('bmw-1'))
    sink.emit(listing('bmw-2'))
    expect(out.text()).toBe('')

    await sink.close()

    expect(out.text()).toBe(`${JSON.stringify([listing('bmw-1'), listing('bmw-2')], null, 2)}\n`)
    expect(JSON.parse(out.text())).toHaveLength(2)
    expect(out.ended()).toBe(true)
    expect(sink.count).toBe(2)
  })
})

describe('NdjsonSink', () => {
  it('writes each record as it arrives', async () => {
    const out = memoryTarget()
    const sink = new NdjsonSink(out.target)

    await sink.emit(listing('bmw-1'))
    expect(out.text()).toBe(`${JSON.stringify(listing('bmw-1'))}\n`)

    await sink.emit(listing('bmw-2'))
    await sink.close()

    expect(out.text().split('\n')).toEqual([
      JSON.stringify(listing('bmw-1')),
      JSON.stringify(listing('bmw-2')),
      '',
    ])
    expect(sink.count).toBe(2)
  })
})

describe('CsvSink', () => {
  it('flattens records and joins lists', () => {
    const row = flattenRecord(listing('bmw-1'))

    expect(row).toMatchObject({
      id: 'bmw-1',
      price: '€ 31,980',
      rawPrice: 31980,
      currency: 'EUR',
      comfort: 'Air conditioning; Heated seats',
      media: '',
      images: 'https://img.example.com/1.jpg',
    })
    expect(row.dealerName).toBeUndefined()
    expect(Object.keys(row)).toEqual([...CSV_COLUMNS])
  })

  it('writes a header and one quoted row per record', async () => {
    const out = memoryTarget()
    const sink = new CsvSink(out.target)

    sink.emit(listing('bmw-1'))
    await sink.close()

    const expectedRow = [
      'bmw-1',
      'BMW X5',
      'https://www.example.com/offers/bmw-1',
      ...blanks(6),
      '"€ 31,980"',
      '31980',
      'EUR',
      ...blanks(21),
      'Air conditioning; Heated seats',
      ...blanks(6),
      'https://img.example.com/1.jpg',
    ].join(',')

    expect(out.text().split('\n')).toEqual([CSV_COLUMNS.join(','), expectedRow, ''])
  })
})

describe('createSink', () => {
  it('picks the sink for the format', () => {
    const { target } = memoryTarget()

    expect(createSink('json', target)).toBeInstanceOf(JsonArraySink)
    expect(createSink('ndjson', target)).toBeInstanceOf(NdjsonSink)
    expect(createSink('csv', target)).toBeInstanceOf(CsvSink)
  })
})

describe('fileTarget', () => {
  it('writes to a file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'crawl-sink-'))
    try {
      const path = join(dir, 'out.ndjson')
      const sink = new NdjsonSink(fileTarget(path))

      await sink.emit(listing('bmw-1'))
      await sink.close()

      expect(readFileSync(path, 'utf8')).toBe(`${JSON.stringify(listing('bmw-1'))}\n`)
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })

  it('creates missing parent directories', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'crawl-sink-'))
    try {
      const path = join(dir, 'nested', 'deeper', 'out.json')
      const sink = createSink('json', fileTarget(path))

      sink.emit(listing('bmw-1'))
      await sink.close()

      expect(JSON.parse(readFileSync(path, 'utf8'))).toEqual([listing('bmw-1')])
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })

  it('rejects on close when the file cannot be opened', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'crawl-sink-'))
    try {
      const sink = createSink('json', fileTarget(dir))

      sink.emit(listing('bmw-1'))

      await expect(sink.close()).rejects.toThrow(/EISDIR/)
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
  })
})

describe('streamTarget', () => {
  it('rejects writes the stream fails', async () => {
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'))
      },
    })
    const target = streamTarget(stream, true)

    await expect(target.write('line\n')).rejects.toThrow('disk full')
    await expect(target.end()).rejects.toThrow('disk full')
  })
})

describe('MemorySink', () => {
  it('keeps records in order', async () => {
    const sink = new MemorySink()

    sink.emit(listing('bmw-1'))
    sink.emit(listing('bmw-2'))
    await sink.close()

    expect(sink.records.map(r => r.id)).toEqual(['bmw-1', 'bmw-2'])
    expect(sink.count).toBe(2)
  })
})
