import { ANSI_DIALECT } from '../dialects';
import { SqlExpressionFactory } from '../factory';
import { createDatasetRelation, createOpaqueRelation } from '../relations';
import { FilterCompiler, quoteString, wildcardToSqlPattern } from './compiler';

describe('FilterCompiler', () => {
  const compiler = new FilterCompiler(new SqlExpressionFactory());
  const orders = createDatasetRelation({
    engine: 'bigquery',
    datasetIdentifier: 'orders',
    columns: ['id', 'amount', 'status', 'name', 'note', 'active', 'closed_at']
  });

  function sqlFor(filter: string): string | undefined {
    return compiler.compile(orders, filter).extract();
  }

  describe('comparisons', () => {
    it('should compile an equality on a string', () => {
      expect(sqlFor('status:"active"')).toBe("`status` = 'active'");
    });

    it('should compile numeric comparisons', () => {
      expect(sqlFor('amount:>10')).toBe('`amount` > 10');
      expect(sqlFor('amount:<=3')).toBe('`amount` <= 3');
    });

    it('should compile booleans', () => {
      expect(sqlFor('active:true')).toBe('`active` = true');
    });

    it('should compile null checks', () => {
      expect(sqlFor('closed_at:null')).toBe('`closed_at` IS NULL');
      expect(sqlFor('NOT closed_at:null')).toBe('`closed_at` IS NOT NULL');
    });

    it('should negate only the innermost null check', () => {
      expect(sqlFor('NOT (closed_at:null AND active:true)')).toBe(
        'NOT ((`closed_at` IS NULL) AND (`active` = true))'
      );
      expect(sqlFor('status:"open" AND NOT closed_at:null')).toBe(
        "(`status` = 'open') AND (`closed_at` IS NOT NULL)"
      );
    });

    it('should compile wildcards to LIKE', () => {
      expect(sqlFor('name:jo*')).toBe("`name` LIKE 'jo%'");
    });

    it('should escape string literals for BigQuery', () => {
      expect(sqlFor('note:"it\'s"')).toBe("`note` = 'it\\'s'");
    });
  });

  describe('logical expressions', () => {
    it('should compile AND', () => {
      expect(sqlFor('amount:>10 AND status:"active"')).toBe(
        "(`amount` > 10) AND (`status` = 'active')"
      );
    });

    it('should compile OR', () => {
      expect(sqlFor('status:"a" OR status:"b"')).toBe("(`status` = 'a') OR (`status` = 'b')");
    });

    it('should compile NOT', () => {
      expect(sqlFor('NOT status:"closed"')).toBe("NOT (`status` = 'closed')");
    });

    it('should treat juxtaposed terms as AND', () => {
      expect(sqlFor('id:1 amount:2')).toBe('(`id` = 1) AND (`amount` = 2)');
    });
  });

  describe('validation', () => {
    it('should return the factory error for a missing column', () => {
      const result = compiler.compile(orders, 'status:"active" AND region:"EU"');

      expect(result.isValid()).toBe(false);
      expect(result.getValidationError()).toBe('Column region is not present in dataset');
    });

    it('should reject relations the factory does not understand', () => {
      const result = compiler.compile(createOpaqueRelation(), 'id:1');

      expect(result.getValidationError()).toBe('relation is of unsupported kind');
    });

    it('should turn parse failures into invalid expressions', () => {
      const result = compiler.compile(orders, '(amount:>10');

      expect(result.isValid()).toBe(false);
      expect(result.getValidationError()).toMatch(/^Failed to parse filter: /);
    });

    it('should reject null with ordering operators', () => {
      const result = compiler.compileExpression(orders, {
        type: 'comparison',
        field: 'amount',
        operator: '>',
        value: null
      });

      expect(result.getValidationError()).toBe('Operator > cannot be used with null');
    });

    it('should reject LIKE on non-strings', () => {
      const result = compiler.compileExpression(orders, {
        type: 'comparison',
        field: 'amount',
        operator: 'LIKE',
        value: 5
      });

      expect(result.getValidationError()).toBe('LIKE requires a string pattern');
    });

    it('should require a right operand for AND', () => {
      const result = compiler.compileExpression(orders, {
        type: 'logical',
        operator: 'AND',
        left: { type: 'comparison', field: 'id', operator: '==', value: 1 }
      });

      expect(result.getValidationError()).toBe('AND requires two operands');
    });
  });

  describe('ANSI dialect', () => {
    const ansi = new FilterCompiler(new SqlExpressionFactory({ dialect: ANSI_DIALECT }));
    const users = createDatasetRelation({
      engine: 'ansi',
      datasetIdentifier: 'users',
      columns: ['name']
    });

    it('should use double-quoted identifiers and doubled string quotes', () => {
      expect(ansi.compile(users, 'name:"O\'Brien"').extract()).toBe('"name" = \'O\'\'Brien\'');
    });

    it('should keep backslashes as-is', () => {
      expect(ansi.compile(users, 'name:"a_b*"').extract()).toBe('"name" LIKE \'a\\_b%\'');
    });
  });
});

describe('wildcardToSqlPattern', () => {
  it('should convert wildcards', () => {
    expect(wildcardToSqlPattern('f*o?bar*')).toBe('f%o_bar%');
  });

  it('should escape existing LIKE special characters', () => {
    expect(wildcardToSqlPattern('foo_%bar*')).toBe('foo\\_\\%bar%');
  });
});

describe('quoteString', () => {
  it('should double backslashes when the dialect uses them as escapes', () => {
    expect(
      quoteString('a\\b', {
        name: 'Test',
        engine: 'test',
        identifierQuote: '`',
        escapedIdentifierQuote: '``',
        escapedStringQuote: "\\'",
        backslashEscapes: true
      })
    ).toBe("'a\\\\b'");
  });
});
