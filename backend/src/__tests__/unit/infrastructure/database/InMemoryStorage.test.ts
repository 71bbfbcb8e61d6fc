import { describe, it, expect } from 'vitest';
import { InMemoryStorage } from '@/infrastructure/database/InMemoryStorage';
import { StorageUnavailableError } from '@/types/error.types';

describe('InMemoryStorage', () => {
  const schedules = [{ id: 1, course_name: 'Calculus I', class_time: 'Mon 08:00', exam_date: '2025-12-09' }];

  it('should answer with the rows of the table named after FROM', async () => {
    const storage = new InMemoryStorage({ schedules });

    expect(await storage.query('SELECT * FROM schedules WHERE id = 1')).toEqual(schedules);
    expect(await storage.query('select exam_date from dbo.[Schedules]')).toEqual(schedules);
  });

  it('should answer unknown tables and table-less queries with no rows', async () => {
    const storage = new InMemoryStorage({ schedules });

    expect(await storage.query('SELECT * FROM courses')).toEqual([]);
    expect(await storage.query('SELECT 1')).toEqual([]);
  });

  it('should record every query', async () => {
    const storage = new InMemoryStorage();
    await storage.query('SELECT 1');

    expect(storage.queries).toEqual(['SELECT 1']);
  });

  it('should fail until recovered', async () => {
    const storage = new InMemoryStorage({ schedules });
    storage.failWith('down for maintenance');

    await expect(storage.query('SELECT * FROM schedules')).rejects.toThrow(StorageUnavailableError);

    storage.recover();
    expect(await storage.query('SELECT * FROM schedules')).toHaveLength(1);
  });
});
