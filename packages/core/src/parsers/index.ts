export {
  parseDate, formatDate, addDays,
  isIsoDate, daysBetween, shiftDate, compactDate,
} from './date-parser.js';
export { parseTime, formatTime, isMinuteOfDay, MINUTES_PER_DAY } from './time-parser.js';
