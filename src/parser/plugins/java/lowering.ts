import type {
  CompilationUnitNode,
  TypeDeclarationNode,
  FieldDeclarationNode,
  VariableDeclaratorNode,
  CallableNode,
  MethodDeclarationNode,
  ParameterNode,
  ImportNode,
  DocCommentNode,
  SourceRange,
} from '../../syntax.js';
import { parseJavadoc } from './javadoc.js';

export interface TreeSitterNode {
  type: string;
  text: string;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  previousNamedSibling: TreeSitterNode | null;
  childForFieldName(name: string): TreeSitterNode | null;
  // Exposed as a getter or a method depending on the binding release
  hasError?: boolean | (() => boolean);
  isMissing?: boolean | (() => boolean);
}

export interface TreeSitterTree {
  rootNode: TreeSitterNode;
}

const TYPE_DECLARATIONS = new Set([
  'class_declaration',
  'interface_declaration',
  'enum_declaration',
  'record_declaration',
  'annotation_type_declaration',
]);

const COMMENTS = new Set(['block_comment', 'line_comment', 'comment']);
const ANNOTATIONS = new Set(['marker_annotation', 'annotation']);
const NAMES = new Set(['identifier', 'scoped_identifier']);

type LoweringContext = {
  /** Local types found inside bodies, hoisted to the unit */
  locals: TypeDeclarationNode[];
};

export function lowerCompilationUnit(root: TreeSitterNode): CompilationUnitNode {
  const unit: CompilationUnitNode = { imports: [], types: [], range: rangeOf(root) };

  for (const child of root.namedChildren) {
    if (child.type === 'package_declaration') {
      unit.packageName = child.namedChildren.find(c => NAMES.has(c.type))?.text;
    } else if (child.type === 'import_declaration') {
      unit.imports.push(lowerImport(child));
    } else if (TYPE_DECLARATIONS.has(child.type)) {
      const context: LoweringContext = { locals: [] };
      unit.types.push(lowerType(child, context), ...context.locals);
    }
  }

  return unit;
}

/** First ERROR or MISSING node in document order, if any. */
export function findSyntaxError(node: TreeSitterNode): TreeSitterNode | undefined {
  if (node.type === 'ERROR' || readFlag(node, node.isMissing)) {
    return node;
  }
  if (node.hasError !== undefined && !readFlag(node, node.hasError)) {
    return undefined;
  }
  for (const child of node.children) {
    const found = findSyntaxError(child);
    if (found) return found;
  }
  return undefined;
}

function readFlag(node: TreeSitterNode, flag: boolean | (() => boolean) | undefined): boolean {
  return typeof flag === 'function' ? flag.call(node) : flag === true;
}

function lowerImport(node: TreeSitterNode): ImportNode {
  return {
    name: node.namedChildren.find(c => NAMES.has(c.type))?.text ?? '',
    isStatic: node.children.some(c => c.type === 'static'),
    isAsterisk: node.namedChildren.some(c => c.type === 'asterisk'),
  };
}

function lowerType(node: TreeSitterNode, context: LoweringContext): TypeDeclarationNode {
  const { keywords, annotations } = lowerModifiers(node);
  const fields: FieldDeclarationNode[] = [];
  const constructors: CallableNode[] = [];
  const methods: MethodDeclarationNode[] = [];
  const members: TypeDeclarationNode[] = [];
  const base = {
    name: nameOf(node),
    modifiers: keywords,
    annotations,
    javadoc: javadocOf(node),
    range: rangeOf(node),
    fields,
    constructors,
    methods,
    members,
  };

  const body = node.childForFieldName('body');
  // Enum constants with a class body are anonymous classes; only their local types survive
  for (const constant of enumConstants(body)) {
    collectLocalTypes(constant, context);
  }

  for (const decl of bodyDeclarations(body)) {
    switch (decl.type) {
      case 'field_declaration':
      case 'constant_declaration':
        fields.push(lowerField(decl));
        collectLocalTypes(decl, context);
        break;
      case 'constructor_declaration':
        constructors.push(lowerCallable(decl));
        collectLocalTypes(decl.childForFieldName('body'), context);
        break;
      case 'method_declaration':
        methods.push({
          ...lowerCallable(decl),
          returnType: decl.childForFieldName('type')?.text ?? 'void',
        });
        collectLocalTypes(decl.childForFieldName('body'), context);
        break;
      case 'compact_constructor_declaration':
        collectLocalTypes(decl.childForFieldName('body'), context);
        break;
      case 'block':
      case 'static_initializer':
        collectLocalTypes(decl, context);
        break;
      default:
        if (TYPE_DECLARATIONS.has(decl.type)) {
          members.push(lowerType(decl, context));
        }
    }
  }

  switch (node.type) {
    case 'class_declaration':
      return {
        ...base,
        variant: 'classOrInterface',
        isInterface: false,
        extendedTypes: typeList(node.childForFieldName('superclass')),
        implementedTypes: typeList(childOfType(node, 'super_interfaces')),
        typeParameters: typeParametersOf(node),
      };
    case 'interface_declaration':
      return {
        ...base,
        variant: 'classOrInterface',
        isInterface: true,
        extendedTypes: typeList(childOfType(node, 'extends_interfaces')),
        implementedTypes: [],
        typeParameters: typeParametersOf(node),
      };
    case 'enum_declaration':
      return { ...base, variant: 'enum' };
    case 'record_declaration':
      return { ...base, variant: 'record' };
    default:
      return { ...base, variant: 'annotation' };
  }
}

function bodyDeclarations(body: TreeSitterNode | null): TreeSitterNode[] {
  if (!body) return [];
  if (body.type === 'enum_body') {
    return childOfType(body, 'enum_body_declarations')?.namedChildren ?? [];
  }
  return body.namedChildren;
}

function enumConstants(body: TreeSitterNode | null): TreeSitterNode[] {
  if (!body || body.type !== 'enum_body') return [];
  return body.namedChildren.filter(c => c.type === 'enum_constant');
}

/**
 * Walks a body for type declarations (local and anonymous-class members).
 * Each one is appended after the types found before it, followed by its own locals.
 */
function collectLocalTypes(node: TreeSitterNode | null, context: LoweringContext): void {
  if (!node) return;
  for (const child of node.namedChildren) {
    if (TYPE_DECLARATIONS.has(child.type)) {
      const inner: LoweringContext = { locals: [] };
      context.locals.push(lowerType(child, inner), ...inner.locals);
    } else {
      collectLocalTypes(child, context);
    }
  }
}

function lowerField(node: TreeSitterNode): FieldDeclarationNode {
  const variables: VariableDeclaratorNode[] = node.namedChildren
    .filter(c => c.type === 'variable_declarator')
    .map(declarator => ({
      name: declarator.childForFieldName('name')?.text ?? '',
      initializer: declarator.childForFieldName('value')?.text,
      range: rangeOf(declarator),
    }));

  return {
    modifiers: lowerModifiers(node).keywords,
    type: node.childForFieldName('type')?.text ?? '',
    javadoc: javadocOf(node),
    variables,
    range: rangeOf(node),
  };
}

function lowerCallable(node: TreeSitterNode): CallableNode {
  const { keywords, annotations } = lowerModifiers(node);
  const parameters = (node.childForFieldName('parameters')?.namedChildren ?? [])
    .map(lowerParameter)
    .filter((param): param is ParameterNode => param !== undefined);

  return {
    name: nameOf(node),
    modifiers: keywords,
    annotations,
    parameters,
    thrownTypes: childOfType(node, 'throws')?.namedChildren.map(t => t.text) ?? [],
    javadoc: javadocOf(node),
    range: rangeOf(node),
  };
}

function lowerParameter(node: TreeSitterNode): ParameterNode | undefined {
  const isFinal = lowerModifiers(node).keywords.includes('final');

  if (node.type === 'formal_parameter') {
    return {
      name: node.childForFieldName('name')?.text ?? '',
      type: node.childForFieldName('type')?.text ?? '',
      isFinal,
      isVarArgs: false,
    };
  }

  if (node.type === 'spread_parameter') {
    const typeNode = node.namedChildren.find(
      c => c.type !== 'modifiers' && c.type !== 'variable_declarator' && !COMMENTS.has(c.type),
    );
    const declarator = childOfType(node, 'variable_declarator');
    return {
      name: declarator?.childForFieldName('name')?.text ?? childOfType(node, 'identifier')?.text ?? '',
      type: typeNode?.text ?? '',
      isFinal,
      isVarArgs: true,
    };
  }

  // receiver parameters and comments
  return undefined;
}

function lowerModifiers(node: TreeSitterNode): { keywords: string[]; annotations: string[] } {
  const modifiers = childOfType(node, 'modifiers');
  const keywords: string[] = [];
  const annotations: string[] = [];

  for (const child of modifiers?.children ?? []) {
    if (ANNOTATIONS.has(child.type)) {
      annotations.push(`@${child.childForFieldName('name')?.text ?? ''}`);
    } else if (!COMMENTS.has(child.type)) {
      keywords.push(child.text);
    }
  }

  return { keywords, annotations };
}

function javadocOf(node: TreeSitterNode): DocCommentNode | undefined {
  const previous = node.previousNamedSibling;
  if (previous && COMMENTS.has(previous.type) && previous.text.startsWith('/**')) {
    return parseJavadoc(previous.text);
  }
  return undefined;
}

function typeParametersOf(node: TreeSitterNode): string[] {
  return (node.childForFieldName('type_parameters')?.namedChildren ?? [])
    .filter(c => c.type === 'type_parameter')
    .map(c => c.text);
}

/** Types under `extends X` / `implements A, B` / `extends A, B` clauses. */
function typeList(clause: TreeSitterNode | null | undefined): string[] {
  if (!clause) return [];
  const list = childOfType(clause, 'type_list');
  const types = list ? list.namedChildren : clause.namedChildren;
  return types.filter(c => !COMMENTS.has(c.type)).map(c => c.text);
}

function childOfType(node: TreeSitterNode, type: string): TreeSitterNode | undefined {
  return node.namedChildren.find(c => c.type === type);
}

function nameOf(node: TreeSitterNode): string {
  return node.childForFieldName('name')?.text ?? '';
}

function rangeOf(node: TreeSitterNode): SourceRange {
  return {
    begin: { line: node.startPosition.row + 1, column: node.startPosition.column + 1 },
    end: { line: node.endPosition.row + 1, column: node.endPosition.column + 1 },
  };
}
