import * as cheerio from 'cheerio'
import { cleanText } from '../normalize/parsers.js'

/**
 * Read-only view over a parsed page.
 *
 * Element text joins descendant text nodes with a space, so
 * `<span>240 kW</span><span>(326 hp)</span>` reads as "240 kW (326 hp)".
 */
export class PageDocument {
  private readonly $: cheerio.CheerioAPI
  private technicalData?: Map<string, string>

  private constructor(html: string) {
    this.$ = cheerio.load(html)
    // Separate adjacent elements' text
    this.$('body *').before(' ').after(' ')
  }

  static load(html: string): PageDocument {
    return new PageDocument(html)
  }

  /** Text of the first element matching `selector` */
  text(selector: string): string | undefined {
    return cleanText(this.$(selector).first().text())
  }

  /** Texts of every element matching `selector`, empty ones dropped */
  texts(selector: string): string[] {
    const $ = this.$
    const values: string[] = []
    $(selector).each((_, el) => {
      const value = cleanText($(el).text())
      if (value) values.push(value)
    })
    return values
  }

  /** First non-empty of `attrs` on the first element matching `selector` */
  attr(selector: string, attrs: readonly string[]): string | undefined {
    const first = this.$(selector).first()
    for (const name of attrs) {
      const value = cleanText(first.attr(name))
      if (value) return value
    }
    return undefined
  }

  /** First non-empty of `attrs` on every element matching `selector` */
  attrs(selector: string, attrs: readonly string[]): string[] {
    const $ = this.$
    const values: string[] = []
    $(selector).each((_, el) => {
      for (const name of attrs) {
        const value = cleanText($(el).attr(name))
        if (value) {
          values.push(value)
          return
        }
      }
    })
    return values
  }

  /**
   * Value of a technical-data entry (`<dt>label</dt><dd>value</dd>`),
   * matched case-insensitively against any of `labels`.
   */
  labelled(labels: readonly string[]): string | undefined {
    const table = this.getTechnicalData()
    for (const label of labels) {
      const value = table.get(label.toLowerCase())
      if (value) return value
    }
    return undefined
  }

  private getTechnicalData(): Map<string, string> {
    if (this.technicalData) return this.technicalData

    const $ = this.$
    const table = new Map<string, string>()
    $('dt').each((_, dt) => {
      const label = cleanText($(dt).text())?.replace(/:$/, '').toLowerCase()
      const value = cleanText($(dt).next('dd').text())
      if (label && value && !table.has(label)) {
        table.set(label, value)
      }
    })

    this.technicalData = table
    return table
  }
}
