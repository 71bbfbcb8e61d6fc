import { describe, it, expect } from 'vitest';
import { stripSqlComments, validateReadOnlyQuery } from './validators';

describe('SQL Query Validator', () => {
  describe('validateReadOnlyQuery - accepted statements', () => {
    it('should accept a plain SELECT', () => {
      expect(validateReadOnlyQuery('SELECT * FROM courses')).toEqual({
        valid: true,
        statement: 'SELECT * FROM courses',
      });
    });

    it('should accept lowercase keywords', () => {
      expect(validateReadOnlyQuery('select course_name from courses').valid).toBe(true);
    });

    it('should accept a common table expression', () => {
      const query = `
        WITH cs AS (SELECT * FROM courses WHERE discipline = 'Computer Science')
        SELECT course_name FROM cs
      `;

      expect(validateReadOnlyQuery(query).valid).toBe(true);
    });

    it('should drop a single trailing semicolon', () => {
      expect(validateReadOnlyQuery('SELECT 1;')).toEqual({ valid: true, statement: 'SELECT 1' });
    });

    it('should accept leading comments and keep them in the statement', () => {
      const query = '-- exams this term\nSELECT exam_date FROM schedules';

      expect(validateReadOnlyQuery(query)).toEqual({ valid: true, statement: query });
    });

    it('should keep comment markers inside string literals', () => {
      const query = "SELECT * FROM courses WHERE description LIKE '%--%' OR description = '/* x */'";

      expect(validateReadOnlyQuery(query)).toEqual({ valid: true, statement: query });
    });

    it('should not flag column names that contain write keywords', () => {
      expect(validateReadOnlyQuery('SELECT updated_at, created_by FROM schedules').valid).toBe(true);
    });

    it('should not flag keywords inside string literals', () => {
      const query = "SELECT * FROM courses WHERE description = 'Drop by; delete nothing'";

      expect(validateReadOnlyQuery(query).valid).toBe(true);
    });
  });

  describe('validateReadOnlyQuery - rejected statements', () => {
    it('should reject DELETE', () => {
      expect(validateReadOnlyQuery('DELETE FROM courses')).toEqual({
        valid: false,
        reason: 'only SELECT or WITH statements are allowed',
      });
    });

    it('should reject a stacked second statement', () => {
      expect(validateReadOnlyQuery('SELECT 1; DROP TABLE courses')).toEqual({
        valid: false,
        reason: 'only a single statement is allowed',
      });
    });

    it('should reject a CTE that writes', () => {
      const query = 'WITH x AS (SELECT 1 AS id) DELETE FROM courses WHERE id IN (SELECT id FROM x)';

      expect(validateReadOnlyQuery(query)).toEqual({
        valid: false,
        reason: 'DELETE is not allowed in a read-only query',
      });
    });

    it('should reject SELECT ... INTO', () => {
      expect(validateReadOnlyQuery('SELECT * INTO dbo.leak FROM courses')).toEqual({
        valid: false,
        reason: 'INTO is not allowed in a read-only query',
      });
    });

    it('should not let a quote inside a comment hide a second statement', () => {
      expect(validateReadOnlyQuery("SELECT 1 -- don't\n; DROP TABLE courses")).toEqual({
        valid: false,
        reason: 'only a single statement is allowed',
      });
    });

    it('should reject EXEC inside a SELECT', () => {
      expect(validateReadOnlyQuery("SELECT 1 EXEC('x')").valid).toBe(false);
    });

    it('should reject a query that is only a comment', () => {
      expect(validateReadOnlyQuery('/* nothing */')).toEqual({ valid: false, reason: 'query is empty' });
    });
  });

  describe('stripSqlComments', () => {
    it('should remove line and block comments', () => {
      expect(stripSqlComments('SELECT /* a */ 1 -- b').trim()).toBe('SELECT   1');
    });

    it('should leave comment markers inside literals alone', () => {
      expect(stripSqlComments("SELECT '--x' AS a -- b")).toBe("SELECT '--x' AS a  ");
    });
  });
});
