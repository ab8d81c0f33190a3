const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
}

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch)
}

function renderAttrs(attrs: Record<string, string | number>): string {
  return Object.entries(attrs)
    .map(([k, v]) => `${k}="${escapeXml(String(v))}"`)
    .join(' ')
}

export function formatXml(tag: string, attrs: Record<string, string | number>): string {
  const attrStr = renderAttrs(attrs)
  return attrStr ? `<${tag} ${attrStr} />` : `<${tag} />`
}

export function xmlElement(tag: string, attrs: Record<string, string | number>, body: string): string {
  const attrStr = renderAttrs(attrs)
  return `<${tag}${attrStr ? ` ${attrStr}` : ''}>\n${body}\n</${tag}>`
}
