/**
 * Overlay Canvas
 *
 * Retained list of SVG primitives for one frame. Tasks draw into it, the
 * loop turns it into an SVG document and sharp composites that over the
 * frame. Coordinates are frame pixels.
 */

export type RectOptions = {
  x: number
  y: number
  width: number
  height: number
  stroke: string
  strokeWidth?: number
  fill?: string
}

export type TextOptions = {
  x: number
  y: number
  text: string
  color: string
  fontSize?: number
  anchor?: 'start' | 'middle' | 'end'
  bold?: boolean
}

const xmlEntities: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

export const escapeXml = (value: string) =>
  value.replace(/[&<>"']/g, (char) => xmlEntities[char] ?? char)

const num = (value: number) => String(Math.round(value * 10) / 10)

export function createOverlayCanvas(width: number, height: number) {
  const elements: Array<string> = []

  return {
    width,
    height,

    rect: ({ x, y, width: w, height: h, stroke, strokeWidth = 2, fill }: RectOptions) => {
      elements.push(
        `<rect x="${num(x)}" y="${num(y)}" width="${num(w)}" height="${num(h)}" ` +
          `fill="${fill ? escapeXml(fill) : 'none'}" stroke="${escapeXml(stroke)}" ` +
          `stroke-width="${num(strokeWidth)}"/>`,
      )
    },

    text: ({ x, y, text, color, fontSize = 16, anchor = 'start', bold = false }: TextOptions) => {
      elements.push(
        `<text x="${num(x)}" y="${num(y)}" fill="${escapeXml(color)}" ` +
          `font-family="monospace" font-size="${num(fontSize)}" text-anchor="${anchor}"` +
          `${bold ? ' font-weight="bold"' : ''} stroke="black" stroke-width="0.6" ` +
          `paint-order="stroke">${escapeXml(text)}</text>`,
      )
    },

    isEmpty: () => elements.length === 0,

    toSvg: () =>
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
      `${elements.join('')}</svg>`,

    clear: () => {
      elements.length = 0
    },
  }
}

export type OverlayCanvas = ReturnType<typeof createOverlayCanvas>
