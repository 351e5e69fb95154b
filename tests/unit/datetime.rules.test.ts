import { extractTime, formatClock, to24Hour } from '../../src/services/datetime/time.rules';
import {
  containsPhrase,
  daysUntilNextWeekday,
  findNextWeekday,
  findRelativeDayOffset,
  normalizeInput,
  stripPartOfDayIdioms,
  translatePhrases,
} from '../../src/services/datetime/phrase.rules';

describe('extractTime', () => {
  it('reads Spanish "a la" and "a las" forms', () => {
    expect(extractTime('a la 1pm')).toEqual({ hour: 13, minute: 0, rule: 'a_la_meridiem' });
    expect(extractTime('a las 8:30 pm')).toEqual({ hour: 20, minute: 30, rule: 'a_las_clock' });
    expect(extractTime('a las 9am')).toEqual({ hour: 9, minute: 0, rule: 'a_las_meridiem' });
  });

  it('reads English and bare forms', () => {
    expect(extractTime('at 12am')).toEqual({ hour: 0, minute: 0, rule: 'at_meridiem' });
    expect(extractTime('at 12pm')).toEqual({ hour: 12, minute: 0, rule: 'at_meridiem' });
    expect(extractTime('friday 15:45')).toEqual({ hour: 15, minute: 45, rule: 'bare_clock' });
    expect(extractTime('around 7 p.m.')).toEqual({ hour: 19, minute: 0, rule: 'bare_meridiem' });
  });

  it('rejects impossible times', () => {
    expect(extractTime('15pm')).toBeNull();
    expect(extractTime('25:00')).toBeNull();
  });

  it('returns null without a clock time', () => {
    expect(extractTime('room 5')).toBeNull();
    expect(extractTime('i am free tomorrow')).toBeNull();
  });
});

describe('clock helpers', () => {
  it('converts meridiem hours', () => {
    expect(to24Hour(12, 'p')).toBe(12);
    expect(to24Hour(12, 'a')).toBe(0);
    expect(to24Hour(7, 'p')).toBe(19);
    expect(to24Hour(7)).toBe(7);
  });

  it('zero-pads', () => {
    expect(formatClock(9, 5)).toBe('09:05');
    expect(formatClock(20, 0)).toBe('20:00');
  });
});

describe('phrase rules', () => {
  it('normalizes case and whitespace', () => {
    expect(normalizeInput('  Próximo   VIERNES ')).toBe('próximo viernes');
  });

  it('matches whole words including accented letters', () => {
    expect(containsPhrase('mañana a las 3', 'mañana')).toBe(true);
    expect(containsPhrase('las mañanas', 'mañana')).toBe(false);
    expect(containsPhrase('hoyo', 'hoy')).toBe(false);
  });

  it('finds relative day offsets, longest phrase first', () => {
    expect(findRelativeDayOffset('pasado mañana')).toBe(2);
    expect(findRelativeDayOffset('the day after tomorrow')).toBe(2);
    expect(findRelativeDayOffset('tomorrow at 3')).toBe(1);
    expect(findRelativeDayOffset('hoy')).toBe(0);
    expect(findRelativeDayOffset('next week')).toBeNull();
  });

  it('strips part-of-day idioms', () => {
    expect(stripPartOfDayIdioms('el lunes por la mañana')).toBe('el lunes');
    expect(stripPartOfDayIdioms('a las 7 de la manana')).toBe('a las 7');
  });

  it('needs a next-marker to pick a weekday', () => {
    expect(findNextWeekday('viernes')).toBeNull();
    expect(findNextWeekday('next friday')).toBe(4);
    expect(findNextWeekday('el próximo lunes o martes')).toBe(0);
    expect(findNextWeekday('proxima semana el domingo')).toBe(6);
  });

  it('counts days to the next weekday, never zero', () => {
    expect(daysUntilNextWeekday(0, 4)).toBe(4);
    expect(daysUntilNextWeekday(4, 4)).toBe(7);
    expect(daysUntilNextWeekday(5, 0)).toBe(2);
  });

  it('translates Spanish date phrases', () => {
    expect(translatePhrases('el 15 de enero a las 2 pm')).toBe('15 january at 2 pm');
    expect(translatePhrases('3 de marzo del 2025')).toBe('3 march 2025');
    expect(translatePhrases('próximo viernes a las 8pm')).toBe('next friday at 8pm');
    expect(translatePhrases('pasado mañana')).toBe('day after tomorrow');
    expect(translatePhrases('este sábado por la mañana')).toBe('this saturday');
  });
});
