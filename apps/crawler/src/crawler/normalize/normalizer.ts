/**
 * Normalizer
 *
 * Raw extracted fields -> ListingRecord. Pure and deterministic.
 *
 * - Every string is trimmed with whitespace collapsed
 * - Structured fields keep their display string; numeric parts are absent
 *   when unparseable
 * - An object field without a display string is itself absent
 * - Feature and image lists are always present, deduplicated in order
 *
 * Absent values are left as undefined properties; JSON output drops them.
 */

import type {
  ContactInfo,
  DealerInfo,
  EngineSize,
  ListingRecord,
  MileageInfo,
  PowerInfo,
  PriceInfo,
  RawFieldMap,
  RegistrationDate,
} from '../types.js'
import { canonicalizeUrl, listingIdFromUrl, resolveUrl } from '../utils/url.js'
import {
  cleanList,
  cleanText,
  parseAmount,
  parseCurrency,
  parseMileageUnit,
  parsePower,
  parseRegistration,
  parseWholeNumber,
} from './parsers.js'

export function normalizePrice(raw: string | undefined): PriceInfo | undefined {
  const display = cleanText(raw)
  if (!display) return undefined
  return { display, rawPrice: parseAmount(display), currency: parseCurrency(display) }
}

export function normalizeMileage(raw: string | undefined): MileageInfo | undefined {
  const display = cleanText(raw)
  if (!display) return undefined
  return { display, value: parseWholeNumber(display), unit: parseMileageUnit(display) }
}

export function normalizePower(raw: string | undefined): PowerInfo | undefined {
  const display = cleanText(raw)
  if (!display) return undefined
  return { display, ...parsePower(display) }
}

export function normalizeRegistration(raw: string | undefined): RegistrationDate | undefined {
  const display = cleanText(raw)
  if (!display) return undefined
  return { display, ...parseRegistration(display) }
}

export function normalizeEngineSize(raw: string | undefined): EngineSize | undefined {
  const display = cleanText(raw)
  if (!display) return undefined
  return { display, cc: parseWholeNumber(display) }
}

function wholeNumber(raw: string | undefined): number | undefined {
  const text = cleanText(raw)
  return text ? parseWholeNumber(text) : undefined
}

function normalizeDealer(fields: RawFieldMap): DealerInfo | undefined {
  const name = cleanText(fields.dealerName)
  const ratingCount = wholeNumber(fields.dealerRatings)
  if (name === undefined && ratingCount === undefined) return undefined
  return { name, ratingCount }
}

function normalizeContact(fields: RawFieldMap): ContactInfo | undefined {
  const name = cleanText(fields.contactName)
  const phone = cleanText(fields.contactPhone)
  if (name === undefined && phone === undefined) return undefined
  return { name, phone }
}

/**
 * Images resolved against the listing URL; unresolvable ones dropped.
 */
function normalizeImages(raw: string[] | undefined, baseUrl: string): string[] {
  const resolved: string[] = []
  for (const src of raw ?? []) {
    const cleaned = cleanText(src)
    const absolute = cleaned ? resolveUrl(cleaned, baseUrl) : undefined
    if (absolute && !resolved.includes(absolute)) {
      resolved.push(absolute)
    }
  }
  return resolved
}

/**
 * The page's own URL anchor wins over the fetched URL when it resolves.
 */
function listingUrl(fields: RawFieldMap): string {
  const anchored = fields.pageUrl ? resolveUrl(fields.pageUrl, fields.url) : undefined
  return canonicalizeUrl(anchored ?? fields.url)
}

export function normalize(fields: RawFieldMap): ListingRecord {
  const url = listingUrl(fields)

  return {
    id: listingIdFromUrl(url),
    title: cleanText(fields.title) ?? '',
    url,

    mark: cleanText(fields.mark),
    model: cleanText(fields.model),
    modelVersion: cleanText(fields.modelVersion),
    location: cleanText(fields.location),
    dealer: normalizeDealer(fields),

    price: normalizePrice(fields.price),
    mileage: normalizeMileage(fields.mileage),
    gearbox: cleanText(fields.gearbox),
    firstRegistration: normalizeRegistration(fields.firstRegistration),
    fuelType: cleanText(fields.fuelType),
    power: normalizePower(fields.power),

    sellerType: cleanText(fields.sellerType),
    contact: normalizeContact(fields),

    bodyType: cleanText(fields.bodyType),
    drivetrain: cleanText(fields.drivetrain),
    seats: wholeNumber(fields.seats),
    engineSize: normalizeEngineSize(fields.engineSize),
    gears: wholeNumber(fields.gears),
    emissionClass: cleanText(fields.emissionClass),

    comfort: cleanList(fields.comfort),
    media: cleanList(fields.media),
    safety: cleanList(fields.safety),
    extras: cleanList(fields.extras),

    colour: cleanText(fields.colour),
    manufacturerColour: cleanText(fields.manufacturerColour),
    productionDate: cleanText(fields.productionDate),

    images: normalizeImages(fields.images, url),
  }
}
