/**
 * Listing page selectors
 *
 * Current markup tags most values with data-testid attributes; the class
 * based selectors after them match the older layout. Labels are matched
 * against the technical-data list (dt/dd) when no selector hits, in the
 * English and German site variants.
 */

import type { ListField, ScalarField } from '../types.js'

export type Cardinality = 'one' | 'many'

export interface FieldRule<C extends Cardinality = Cardinality> {
  /** Tried in order; the first non-empty hit wins (`one`) or all hits are collected (`many`) */
  selectors: readonly string[]
  /** Technical-data labels, tried after the selectors */
  labels?: readonly string[]
  /** Read these attributes (first non-empty) instead of the element text */
  attrs?: readonly string[]
  cardinality: C
}

export type FieldRules = { readonly [K in ScalarField]: FieldRule<'one'> } & {
  readonly [K in ListField]: FieldRule<'many'>
}

export const FIELD_RULES: FieldRules = {
  title: {
    selectors: ['h1[data-testid="heading"]', 'h1', 'h2[data-item-name="car-title"]'],
    cardinality: 'one',
  },
  pageUrl: {
    selectors: ['link[rel="canonical"]', 'meta[property="og:url"]'],
    attrs: ['href', 'content'],
    cardinality: 'one',
  },
  price: {
    selectors: ['[data-testid="price-label"]', 'div.price-block span', 'span[data-item-name=price]'],
    labels: ['Price', 'Preis'],
    cardinality: 'one',
  },
  location: {
    selectors: ['[data-testid="seller-address"]', 'div.seller-address', 'span[itemprop=address]'],
    cardinality: 'one',
  },
  dealerName: {
    selectors: ['[data-testid="seller-name"]', 'div.dealer-info h2', '.cldt-vendor-contact-box h2'],
    cardinality: 'one',
  },
  dealerRatings: {
    selectors: ['[data-testid="rating-count"]', 'span.dealer-rating-count'],
    cardinality: 'one',
  },
  mark: {
    selectors: ['[data-testid="makeLabel"]', 'span[itemprop=brand]'],
    labels: ['Make', 'Marke'],
    cardinality: 'one',
  },
  model: {
    selectors: ['[data-testid="modelLabel"]', 'span[itemprop=model]'],
    labels: ['Model', 'Modell'],
    cardinality: 'one',
  },
  modelVersion: {
    selectors: ['[data-testid="versionLabel"]', 'span.model-version'],
    labels: ['Model version', 'Modellversion'],
    cardinality: 'one',
  },
  mileage: {
    selectors: ['[data-testid="mileage-label"]', 'span.mileage'],
    labels: ['Mileage', 'Kilometerstand'],
    cardinality: 'one',
  },
  gearbox: {
    selectors: ['[data-testid="transmission-label"]', 'span.gearbox'],
    labels: ['Gearbox', 'Transmission', 'Getriebe'],
    cardinality: 'one',
  },
  firstRegistration: {
    selectors: ['[data-testid="first-registration-label"]', 'span.first-registration'],
    labels: ['First registration', 'Erstzulassung'],
    cardinality: 'one',
  },
  fuelType: {
    selectors: ['[data-testid="fuel-label"]', 'span.fuel'],
    labels: ['Fuel type', 'Kraftstoff', 'Kraftstoffart'],
    cardinality: 'one',
  },
  power: {
    selectors: ['[data-testid="power-label"]', 'span.power'],
    labels: ['Power', 'Leistung'],
    cardinality: 'one',
  },
  sellerType: {
    selectors: ['[data-testid="seller-type-label"]', 'span.seller-type'],
    labels: ['Seller', 'Anbieter'],
    cardinality: 'one',
  },
  contactName: {
    selectors: ['[data-testid="seller-contact-name"]', '.cldt-vendor-contact-box span'],
    cardinality: 'one',
  },
  contactPhone: {
    selectors: ['[data-testid="seller-phone"]', "a[href^='tel:']"],
    cardinality: 'one',
  },
  bodyType: {
    selectors: ['[data-testid="body-type-label"]', 'span.body-type'],
    labels: ['Body type', 'Karosserieform'],
    cardinality: 'one',
  },
  drivetrain: {
    selectors: ['[data-testid="drive-type-label"]', 'span.drivetrain'],
    labels: ['Drivetrain', 'Antriebsart'],
    cardinality: 'one',
  },
  seats: {
    selectors: ['[data-testid="num-seats-label"]', 'span.seats'],
    labels: ['Seats', 'Sitzplätze'],
    cardinality: 'one',
  },
  engineSize: {
    selectors: ['[data-testid="cubic-capacity-label"]', 'span.engine-size'],
    labels: ['Engine size', 'Hubraum'],
    cardinality: 'one',
  },
  gears: {
    selectors: ['[data-testid="gears-label"]', 'span.gears'],
    labels: ['Gears', 'Gänge'],
    cardinality: 'one',
  },
  emissionClass: {
    selectors: ['[data-testid="emission-class-label"]', 'span.emission-class'],
    labels: ['Emission class', 'Schadstoffklasse'],
    cardinality: 'one',
  },
  colour: {
    selectors: ['[data-testid="exterior-color-label"]', 'span.exterior-color'],
    labels: ['Colour', 'Color', 'Außenfarbe'],
    cardinality: 'one',
  },
  manufacturerColour: {
    selectors: ['[data-testid="manufacturer-color-label"]', 'span.manufacturer-color'],
    labels: ['Manufacturer colour', 'Manufacturer color', 'Farbe laut Hersteller'],
    cardinality: 'one',
  },
  productionDate: {
    selectors: ['[data-testid="production-date-label"]', 'span.production-date'],
    labels: ['Production date', 'Baujahr'],
    cardinality: 'one',
  },
  comfort: {
    selectors: ['[data-testid="comfort-features"] li', 'ul.comfort-features li'],
    cardinality: 'many',
  },
  media: {
    selectors: ['[data-testid="media-features"] li', 'ul.media-features li'],
    cardinality: 'many',
  },
  safety: {
    selectors: ['[data-testid="safety-features"] li', 'ul.safety-features li'],
    cardinality: 'many',
  },
  extras: {
    selectors: ['[data-testid="other-features"] li', 'ul.extra-features li'],
    cardinality: 'many',
  },
  images: {
    selectors: ['figure img', '[data-testid="gallery"] img', '.image-gallery img'],
    attrs: ['src', 'data-src'],
    cardinality: 'many',
  },
}

/**
 * Search result page selectors
 */
export const SEARCH_SELECTORS = {
  listingLinks: 'a[href*="/angebote/"], a[href*="/offers/"], a[data-item-name="detail-page-link"]',
  nextPage: ['a[rel="next"]', 'a[aria-label*="Next"]', 'a[aria-label*="Weiter"]'],
} as const
