import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { JavaParserPlugin } from '../src/parser/plugins/java/index.js';
import { extractTypeDeclarations, extractImports } from '../src/parser/extractor.js';
import type { CompilationUnitNode } from '../src/parser/syntax.js';
import type { TypeDeclaration } from '../src/model/type-declaration.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');
}

function parseUnit(parser: JavaParserPlugin, name: string): CompilationUnitNode {
  const outcome = parser.parse(fixture(name), name);
  if (!outcome.ok) throw new Error(outcome.error);
  return outcome.value;
}

function find(types: TypeDeclaration[], name: string): TypeDeclaration {
  const type = types.find(t => t.name === name);
  if (!type) throw new Error(`no type ${name}`);
  return type;
}

describe('JavaParserPlugin', () => {
  const parser = new JavaParserPlugin();

  it('reports empty content', () => {
    expect(parser.parse('', 'Empty.java')).toEqual({ ok: false, error: 'No content to parse' });
  });

  it('reports syntax errors with a line number', () => {
    const outcome = parser.parse(fixture('Broken.java'), 'Broken.java');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toMatch(/^Parse failed: syntax error at line \d+$/);
    }
  });

  describe('Shapes.java', () => {
    const unit = parseUnit(parser, 'Shapes.java');
    const types = extractTypeDeclarations(unit, unit.packageName);
    const shape = find(types, 'Shape');

    it('reads package and imports', () => {
      expect(unit.packageName).toBe('com.example.shapes');
      expect(extractImports(unit)).toEqual([
        'java.util.List',
        'java.util.*',
        'static java.lang.Math.PI',
      ]);
    });

    it('hoists local classes after their top-level type', () => {
      expect(types.map(t => t.qualifiedName)).toEqual([
        'com.example.shapes.Shape',
        'com.example.shapes.Accumulator',
      ]);
      expect(types[1].fields.map(f => f.name)).toEqual(['total']);
    });

    it('reads the class header', () => {
      expect(shape).toMatchObject({
        kind: 'class',
        modifiers: ['public', 'abstract'],
        typeParameters: ['T extends Number'],
        superClass: 'Base',
        interfaces: ['Comparable<Shape<T>>', 'Cloneable'],
        documentation: 'Base type for all shapes.',
        startLine: 12,
        endLine: 65,
      });
    });

    it('splits declarators into fields', () => {
      expect(shape.fields).toEqual([
        { name: 'count', type: 'int', modifiers: ['private', 'static'], initializer: '0', documentation: 'Shared counter.', line: 15 },
        { name: 'limit', type: 'int', modifiers: ['private', 'static'], initializer: undefined, documentation: 'Shared counter.', line: 15 },
        { name: 'name', type: 'String', modifiers: ['protected', 'final'], initializer: undefined, documentation: undefined, line: 17 },
      ]);
    });

    it('names constructors after the type and binds their parameter docs', () => {
      const [ctor] = shape.methods;
      expect(ctor).toMatchObject({
        name: 'Shape',
        isConstructor: true,
        returnType: undefined,
        documentation: 'Creates a shape.',
        startLine: 24,
        endLine: 26,
      });
      expect(ctor.parameters).toEqual([
        { name: 'name', type: 'String', isFinal: true, isVarArgs: false, documentation: 'display name' },
      ]);
    });

    it('reads annotations, thrown types and return docs', () => {
      const area = shape.methods[1];
      expect(area).toMatchObject({
        name: 'area',
        returnType: 'double',
        modifiers: ['public', 'abstract'],
        annotations: ['@Override'],
        thrownTypes: ['IllegalStateException'],
        documentation: 'Computes the area.',
        returnDocumentation: 'the area in square units',
        isConstructor: false,
        startLine: 34,
        endLine: 35,
      });
    });

    it('marks varargs parameters', () => {
      const sum = shape.methods[2];
      expect(sum.name).toBe('sum');
      expect(sum.parameters).toEqual([
        { name: 'first', type: 'int', isFinal: false, isVarArgs: false, documentation: 'the first value' },
        { name: 'rest', type: 'int', isFinal: false, isVarArgs: true, documentation: 'remaining values' },
      ]);
      expect(sum.returnDocumentation).toBe('the total');
    });

    it('nests member types with qualified names', () => {
      expect(shape.nestedTypes.map(t => t.qualifiedName)).toEqual(['com.example.shapes.Shape.Corner']);
      const corner = shape.nestedTypes[0];
      expect(corner.documentation).toBe('Corner of a shape.');
      expect(corner.methods.map(m => m.name)).toEqual(['getX']);
      expect(corner.nestedTypes.map(t => [t.qualifiedName, t.kind])).toEqual([
        ['com.example.shapes.Shape.Corner.Side', 'enum'],
      ]);
    });
  });

  describe('Locals.java', () => {
    const unit = parseUnit(parser, 'Locals.java');
    const types = extractTypeDeclarations(unit, unit.packageName);

    it('hoists types declared in initializers, enum constants and compact constructors', () => {
      expect(types.map(t => t.qualifiedName)).toEqual([
        'com.example.locals.Holder',
        'com.example.locals.InLambda',
        'com.example.locals.InAnonymous',
        'com.example.locals.InConstant',
        'com.example.locals.InCompact',
      ]);
      expect(find(types, 'InLambda').fields.map(f => f.name)).toEqual(['runs']);
    });

    it('keeps member types nested', () => {
      expect(find(types, 'Holder').nestedTypes.map(t => t.qualifiedName)).toEqual([
        'com.example.locals.Holder.Mode',
        'com.example.locals.Holder.Range',
      ]);
      expect(find(types, 'Holder').fields.map(f => f.name)).toEqual(['task', 'listener']);
    });
  });

  describe('Kinds.java', () => {
    const unit = parseUnit(parser, 'Kinds.java');
    const types = extractTypeDeclarations(unit, unit.packageName);

    it('classifies every kind of declaration', () => {
      expect(types.map(t => [t.name, t.kind])).toEqual([
        ['Named', 'interface'],
        ['Color', 'enum'],
        ['Point', 'record'],
        ['Marker', 'annotation'],
      ]);
    });

    it('keeps the last interface an interface extends', () => {
      const named = find(types, 'Named');
      expect(named.superClass).toBe('java.io.Serializable');
      expect(named.interfaces).toEqual([]);
      expect(named.documentation).toBe('Things with a name.');
    });

    it('reads interface constants and default methods', () => {
      const named = find(types, 'Named');
      expect(named.fields.map(f => [f.name, f.type, f.initializer])).toEqual([['PREFIX', 'String', '"n:"']]);
      expect(named.methods.map(m => [m.name, m.modifiers])).toEqual([
        ['name', []],
        ['label', ['default']],
      ]);
    });

    it('reads enum body declarations', () => {
      const color = find(types, 'Color');
      expect(color.fields.map(f => f.name)).toEqual(['code']);
      expect(color.methods.map(m => [m.name, m.isConstructor])).toEqual([
        ['Color', true],
        ['code', false],
      ]);
    });

    it('reads record methods', () => {
      const point = find(types, 'Point');
      expect(point.methods.map(m => [m.name, m.returnType, m.modifiers])).toEqual([
        ['origin', 'Point', ['static']],
      ]);
    });
  });
});
