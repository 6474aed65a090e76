/**
 * First index of a window of `capacity` items that keeps `selected` in view,
 * centered where possible.
 */
export function windowStart(total: number, selected: number | null, capacity: number): number {
  if (capacity <= 0 || total <= capacity || selected === null) return 0
  const centered = selected - Math.floor(capacity / 2)
  return Math.min(Math.max(0, centered), total - capacity)
}

export function truncate(text: string, width: number): string {
  if (width <= 0) return ''
  if (text.length <= width) return text
  return width === 1 ? '…' : text.slice(0, width - 1) + '…'
}

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

export function spinnerFrame(frameCount: number): string {
  return SPINNER_FRAMES[frameCount % SPINNER_FRAMES.length] ?? ''
}
