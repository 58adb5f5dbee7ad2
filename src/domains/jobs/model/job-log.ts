export type JobLogLevel = "debug" | "info" | "warning" | "error"

/** `HH:MM:SS` with total hours, so long jobs read `27:03:00`. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds))
  const pad = (n: number) => String(n).padStart(2, "0")

  return `${pad(Math.floor(seconds / 3600))}:${pad(Math.floor((seconds % 3600) / 60))}:${pad(seconds % 60)}`
}

function formatTimestamp(at: Date): string {
  return at.toISOString().slice(0, 19).replace("T", " ")
}

export type JobLogLine = {
  at: Date
  level: JobLogLevel
  duration: string
  progress: number
  status: string
  message: string
}

/** `[2026-01-02 03:04:05] INFO     [job] 00:01:30  40% running    message` */
export function formatJobLogLine(line: JobLogLine): string {
  const level = line.level.toUpperCase().padEnd(8)
  const progress = String(Math.trunc(line.progress)).padStart(3)

  return `[${formatTimestamp(line.at)}] ${level} [job] ${line.duration} ${progress}% ${line.status.padEnd(10)} ${line.message}`
}
