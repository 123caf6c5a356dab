const DAY_SECONDS = 86_400;

export function parseSchedule(schedule: string): { hour: number; minute: number } | null {
  const m = /^(\d{2}):(\d{2})$/.exec(schedule.trim());
  if (!m) return null;
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

// Latest HH:MM (UTC) at or before `now`.
export function latestOccurrence(now: number, schedule: string): number | null {
  const parsed = parseSchedule(schedule);
  if (!parsed) return null;

  const dayStart = Math.floor(now / DAY_SECONDS) * DAY_SECONDS;
  const occurrence = dayStart + parsed.hour * 3600 + parsed.minute * 60;
  return occurrence > now ? occurrence - DAY_SECONDS : occurrence;
}

export function isReportDue(
  now: number,
  schedule: string,
  graceMinutes: number,
  lastReportAt: number | null,
): boolean {
  const occurrence = latestOccurrence(now, schedule);
  if (occurrence === null) return false;
  if (now >= occurrence + graceMinutes * 60) return false;
  return lastReportAt === null || lastReportAt < occurrence;
}
