// Unit tests for calendar date helpers
import { todayIn } from '../../../src/shared/utils/date.util';

describe('todayIn', () => {
  const lateEvening = new Date('2024-03-10T23:30:00Z');

  it('formats the date in UTC', () => {
    expect(todayIn('UTC', lateEvening)).toBe('2024-03-10');
  });

  it('moves forward for zones ahead of UTC', () => {
    expect(todayIn('Asia/Tokyo', lateEvening)).toBe('2024-03-11');
  });

  it('moves back for zones behind UTC', () => {
    expect(todayIn('America/New_York', new Date('2024-03-10T03:00:00Z'))).toBe('2024-03-09');
  });
});
