import { useStdout } from 'ink'
import { useEffect, useState } from 'react'

export type TerminalSize = { columns: number; rows: number }

const FALLBACK: TerminalSize = { columns: 80, rows: 24 }

export function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout()
  const read = (): TerminalSize => ({
    columns: stdout.columns || FALLBACK.columns,
    rows: stdout.rows || FALLBACK.rows
  })
  const [size, setSize] = useState(read)

  useEffect(() => {
    const onResize = () => setSize(read())
    stdout.on('resize', onResize)
    return () => {
      stdout.off('resize', onResize)
    }
  }, [stdout])

  return size
}
