/**
 * Output Sinks
 *
 * - json: one JSON array, written on close
 * - ndjson: one record per line, written as records arrive
 * - csv: flattened columns, feature and image lists joined with "; "
 */

import { createWriteStream, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ListingRecord, RecordSink } from '../crawler/types.js'
import type { OutputFormat } from '../config/settings.js'

export interface OutputSink extends RecordSink {
  /** Records accepted so far */
  readonly count: number
  /** Flush buffered output and release the target */
  close(): Promise<void>
}

export interface TextTarget {
  write(chunk: string): Promise<void>
  end(): Promise<void>
}

/**
 * Stream errors reject the pending write or end, and every call after them.
 */
export function streamTarget(stream: NodeJS.WritableStream, closeOnEnd: boolean): TextTarget {
  let streamError: Error | undefined
  const pending = new Set<(error: Error) => void>()

  stream.on('error', (error: Error) => {
    if (!streamError) streamError = error
    for (const reject of pending) reject(error)
    pending.clear()
  })

  function settle(start: (done: (error?: Error | null) => void) => void): Promise<void> {
    if (streamError) return Promise.reject(streamError)
    return new Promise<void>((resolve, reject) => {
      pending.add(reject)
      start(error => {
        pending.delete(reject)
        const failure = error ?? streamError
        if (failure) {
          reject(failure)
        } else {
          resolve()
        }
      })
    })
  }

  return {
    write: chunk => settle(done => stream.write(chunk, done)),
    end: () => (closeOnEnd ? settle(done => stream.end(done)) : Promise.resolve()),
  }
}

/**
 * Write to `path`, creating missing parent directories.
 */
export function fileTarget(path: string): TextTarget {
  mkdirSync(dirname(path), { recursive: true })
  return streamTarget(createWriteStream(path, { encoding: 'utf8' }), true)
}

export function stdoutTarget(): TextTarget {
  return streamTarget(process.stdout, false)
}

/**
 * Keeps records in memory; for programmatic runs and tests.
 */
export class MemorySink implements OutputSink {
  readonly records: ListingRecord[] = []

  get count(): number {
    return this.records.length
  }

  emit(record: ListingRecord): void {
    this.records.push(record)
  }

  async close(): Promise<void> {}
}

export class JsonArraySink implements OutputSink {
  private readonly records: ListingRecord[] = []

  constructor(private readonly target: TextTarget) {}

  get count(): number {
    return this.records.length
  }

  emit(record: ListingRecord): void {
    this.records.push(record)
  }

  async close(): Promise<void> {
    await this.target.write(`${JSON.stringify(this.records, null, 2)}\n`)
    await this.target.end()
  }
}

export class NdjsonSink implements OutputSink {
  private written = 0

  constructor(private readonly target: TextTarget) {}

  get count(): number {
    return this.written
  }

  async emit(record: ListingRecord): Promise<void> {
    this.written += 1
    await this.target.write(`${JSON.stringify(record)}\n`)
  }

  async close(): Promise<void> {
    await this.target.end()
  }
}

export const CSV_COLUMNS = [
  'id',
  'title',
  'url',
  'mark',
  'model',
  'modelVersion',
  'location',
  'dealerName',
  'dealerRatingCount',
  'price',
  'rawPrice',
  'currency',
  'mileage',
  'mileageValue',
  'mileageUnit',
  'gearbox',
  'firstRegistration',
  'registrationMonth',
  'registrationYear',
  'fuelType',
  'power',
  'powerKw',
  'powerHp',
  'sellerType',
  'contactName',
  'contactPhone',
  'bodyType',
  'drivetrain',
  'seats',
  'engineSize',
  'engineCc',
  'gears',
  'emissionClass',
  'comfort',
  'media',
  'safety',
  'extras',
  'colour',
  'manufacturerColour',
  'productionDate',
  'images',
] as const

export type CsvColumn = (typeof CSV_COLUMNS)[number]

export const LIST_SEPARATOR = '; '

export function flattenRecord(record: ListingRecord): Record<CsvColumn, string | number | undefined> {
  return {
    id: record.id,
    title: record.title,
    url: record.url,
    mark: record.mark,
    model: record.model,
    modelVersion: record.modelVersion,
    location: record.location,
    dealerName: record.dealer?.name,
    dealerRatingCount: record.dealer?.ratingCount,
    price: record.price?.display,
    rawPrice: record.price?.rawPrice,
    currency: record.price?.currency,
    mileage: record.mileage?.display,
    mileageValue: record.mileage?.value,
    mileageUnit: record.mileage?.unit,
    gearbox: record.gearbox,
    firstRegistration: record.firstRegistration?.display,
    registrationMonth: record.firstRegistration?.month,
    registrationYear: record.firstRegistration?.year,
    fuelType: record.fuelType,
    power: record.power?.display,
    powerKw: record.power?.kw,
    powerHp: record.power?.hp,
    sellerType: record.sellerType,
    contactName: record.contact?.name,
    contactPhone: record.contact?.phone,
    bodyType: record.bodyType,
    drivetrain: record.drivetrain,
    seats: record.seats,
    engineSize: record.engineSize?.display,
    engineCc: record.engineSize?.cc,
    gears: record.gears,
    emissionClass: record.emissionClass,
    comfort: record.comfort.join(LIST_SEPARATOR),
    media: record.media.join(LIST_SEPARATOR),
    safety: record.safety.join(LIST_SEPARATOR),
    extras: record.extras.join(LIST_SEPARATOR),
    colour: record.colour,
    manufacturerColour: record.manufacturerColour,
    productionDate: record.productionDate,
    images: record.images.join(LIST_SEPARATOR),
  }
}

export class CsvSink implements OutputSink {
  private readonly rows: Array<Record<CsvColumn, string | number | undefined>> = []

  constructor(private readonly target: TextTarget) {}

  get count(): number {
    return this.rows.length
  }

  emit(record: ListingRecord): void {
    this.rows.push(flattenRecord(record))
  }

  async close(): Promise<void> {
    await this.target.write(stringify(this.rows, { header: true, columns: [...CSV_COLUMNS] }))
    await this.target.end()
  }
}

export function createSink(format: OutputFormat, target: TextTarget): OutputSink {
  switch (format) {
    case 'json':
      return new JsonArraySink(target)
    case 'ndjson':
      return new NdjsonSink(target)
    case 'csv':
      return new CsvSink(target)
  }
}
