const SUNDAY = 0;
const SATURDAY = 6;

export const isWeekend = (date: Date): boolean => {
  const day = date.getDay();
  return day === SATURDAY || day === SUNDAY;
};

/**
 * Most recent business day on or before `now`: Saturday and Sunday map back to Friday.
 * Public holidays are not considered.
 */
export const getLastBusinessDay = (now: Date = new Date()): Date => {
  const result = new Date(now.getTime());
  switch (now.getDay()) {
    case SATURDAY:
      result.setDate(result.getDate() - 1);
      break;
    case SUNDAY:
      result.setDate(result.getDate() - 2);
      break;
  }
  return result;
};

/**
 * Formats a date as DD.MM.YYYY, the format TEFAS expects
 */
export const formatTefasDate = (date: Date): string => {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}.${month}.${date.getFullYear()}`;
};
