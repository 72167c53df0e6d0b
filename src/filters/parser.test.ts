import { FilterParseError, FilterParser } from './parser';
import { FilterExpression } from './types';

describe('FilterParser', () => {
  let parser: FilterParser;

  beforeEach(() => {
    parser = new FilterParser();
  });

  it('should parse a quoted equality', () => {
    const expected: FilterExpression = {
      type: 'comparison',
      field: 'status',
      operator: '==',
      value: 'active'
    };

    expect(parser.parse('status:"active"')).toEqual(expected);
  });

  it('should parse range comparisons with numbers', () => {
    expect(parser.parse('amount:>=10')).toEqual({
      type: 'comparison',
      field: 'amount',
      operator: '>=',
      value: 10
    });
    expect(parser.parse('amount:<3')).toEqual({
      type: 'comparison',
      field: 'amount',
      operator: '<',
      value: 3
    });
  });

  it('should parse null and boolean values', () => {
    expect(parser.parse('closed_at:null')).toEqual({
      type: 'comparison',
      field: 'closed_at',
      operator: '==',
      value: null
    });
    expect(parser.parse('active:true')).toEqual({
      type: 'comparison',
      field: 'active',
      operator: '==',
      value: true
    });
  });

  it('should turn wildcard terms into LIKE', () => {
    expect(parser.parse('name:jo*')).toEqual({
      type: 'comparison',
      field: 'name',
      operator: 'LIKE',
      value: 'jo*'
    });
  });

  it('should parse logical expressions', () => {
    const expected: FilterExpression = {
      type: 'logical',
      operator: 'OR',
      left: { type: 'comparison', field: 'status', operator: '==', value: 'a' },
      right: { type: 'comparison', field: 'status', operator: '==', value: 'b' }
    };

    expect(parser.parse('status:"a" OR status:"b"')).toEqual(expected);
  });

  it('should parse NOT', () => {
    expect(parser.parse('NOT status:"closed"')).toEqual({
      type: 'logical',
      operator: 'NOT',
      left: { type: 'comparison', field: 'status', operator: '==', value: 'closed' }
    });
  });

  it('should unwrap parentheses', () => {
    expect(parser.parse('(id:1)')).toEqual({
      type: 'comparison',
      field: 'id',
      operator: '==',
      value: 1
    });
  });

  it('should require a field on every term', () => {
    expect(() => parser.parse('active')).toThrow('Filter terms must name a column');
  });

  it('should reject range expressions', () => {
    expect(() => parser.parse('amount:[1 TO 5]')).toThrow(
      'Unsupported expression for column amount: RangeExpression'
    );
  });

  it('should wrap syntax errors', () => {
    expect(() => parser.parse('(amount:>10')).toThrow(FilterParseError);
  });
});
