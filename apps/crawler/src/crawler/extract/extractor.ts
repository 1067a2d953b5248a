/**
 * Field Extractor
 *
 * Applies the declarative rule table to a listing page. Pure with respect to
 * its input: the same markup always yields the same fields.
 *
 * Mandatory anchors: a title, plus a price or a page URL (canonical link /
 * og:url). Anything less is not a listing page.
 */

import type { ExtractResult, ListField, RawFieldMap, ScalarField } from '../types.js'
import { LIST_FIELDS, SCALAR_FIELDS } from '../types.js'
import { looksLikeBlockedPage } from '../fetch/http-fetcher.js'
import { PageDocument } from './document.js'
import { FIELD_RULES, type FieldRule, type FieldRules } from './selectors.js'

export class FieldExtractor {
  constructor(private readonly rules: FieldRules = FIELD_RULES) {}

  extract(html: string, url: string): ExtractResult {
    if (html.trim() === '') {
      return { ok: false, reason: 'EMPTY_PAGE', details: 'Empty document' }
    }
    if (looksLikeBlockedPage(html)) {
      return { ok: false, reason: 'BLOCKED_PAGE', details: 'Anti-bot or captcha markup' }
    }

    const doc = PageDocument.load(html)

    const scalars: Partial<Record<ScalarField, string>> = {}
    for (const field of SCALAR_FIELDS) {
      const value = readOne(doc, this.rules[field])
      if (value !== undefined) scalars[field] = value
    }

    const lists: Partial<Record<ListField, string[]>> = {}
    for (const field of LIST_FIELDS) {
      const values = readMany(doc, this.rules[field])
      if (values.length > 0) lists[field] = values
    }

    const title = scalars.title
    if (!title) {
      return { ok: false, reason: 'TITLE_NOT_FOUND', details: 'No title element' }
    }
    if (!scalars.price && !scalars.pageUrl) {
      return { ok: false, reason: 'ANCHORS_NOT_FOUND', details: 'Neither price nor page URL found' }
    }

    const fields: RawFieldMap = { ...scalars, ...lists, title, url }
    return { ok: true, fields }
  }
}

function readOne(doc: PageDocument, rule: FieldRule<'one'>): string | undefined {
  for (const selector of rule.selectors) {
    const value = rule.attrs ? doc.attr(selector, rule.attrs) : doc.text(selector)
    if (value) return value
  }
  return rule.labels ? doc.labelled(rule.labels) : undefined
}

function readMany(doc: PageDocument, rule: FieldRule<'many'>): string[] {
  const values: string[] = []
  for (const selector of rule.selectors) {
    values.push(...(rule.attrs ? doc.attrs(selector, rule.attrs) : doc.texts(selector)))
  }
  return values
}
