import type {
  CompilationUnitNode,
  TypeDeclarationNode,
  FieldDeclarationNode,
  CallableNode,
  MethodDeclarationNode,
  DocCommentNode,
} from './syntax.js';
import type {
  TypeDeclaration,
  TypeKind,
  FieldMember,
  MethodMember,
  Parameter,
} from '../model/type-declaration.js';
import { qualify } from '../model/type-declaration.js';
import { InvalidArgumentError } from '../utils/errors.js';

/**
 * Builds the declaration forest for one compilation unit. Nested types are
 * embedded in their parent and never returned at the top level.
 */
export function extractTypeDeclarations(
  unit: CompilationUnitNode | null | undefined,
  namespace?: string,
): TypeDeclaration[] {
  if (!unit) {
    throw new InvalidArgumentError('extractTypeDeclarations requires a parsed compilation unit');
  }
  return unit.types.map(node => extractType(node, namespace));
}

/** Imports as plain strings: `a.b.C`, `a.b.*`, `static a.b.C.d`. */
export function extractImports(unit: CompilationUnitNode): string[] {
  return unit.imports.map(imp => {
    let path = imp.name;
    if (imp.isAsterisk) path += '.*';
    if (imp.isStatic) path = `static ${path}`;
    return path;
  });
}

function extractType(node: TypeDeclarationNode, namespace: string | undefined): TypeDeclaration {
  const qualifiedName = qualify(namespace, node.name);

  let kind: TypeKind;
  let superClass: string | undefined;
  let interfaces: string[] = [];
  let typeParameters: string[] = [];

  switch (node.variant) {
    case 'classOrInterface':
      kind = node.isInterface ? 'interface' : 'class';
      // An interface may extend several types; the last one is kept
      superClass = node.extendedTypes.at(-1);
      interfaces = [...node.implementedTypes];
      typeParameters = [...node.typeParameters];
      break;
    case 'enum':
      kind = 'enum';
      break;
    case 'record':
      kind = 'record';
      break;
    case 'annotation':
      kind = 'annotation';
      break;
    default:
      return assertNever(node);
  }

  const methods: MethodMember[] = [
    ...node.constructors.map(ctor => extractCallable(ctor, node.name, true)),
    ...node.methods.map(method => extractCallable(method, method.name, false)),
  ];

  return {
    name: node.name,
    qualifiedName,
    kind,
    modifiers: [...node.modifiers],
    superClass,
    interfaces,
    typeParameters,
    annotations: [...node.annotations],
    documentation: descriptionOf(node.javadoc),
    startLine: node.range.begin.line,
    endLine: node.range.end.line,
    fields: node.fields.flatMap(extractFields),
    methods,
    nestedTypes: node.members.map(member => extractType(member, qualifiedName)),
  };
}

function extractFields(decl: FieldDeclarationNode): FieldMember[] {
  const modifiers = decl.modifiers;
  const documentation = descriptionOf(decl.javadoc);

  return decl.variables.map(variable => ({
    name: variable.name,
    type: decl.type,
    modifiers: [...modifiers],
    initializer: variable.initializer,
    documentation,
    line: variable.range.begin.line,
  }));
}

function extractCallable(node: CallableNode, name: string, isConstructor: boolean): MethodMember {
  const paramDocs = paramDocumentation(node.javadoc);

  const parameters: Parameter[] = node.parameters.map(param => ({
    name: param.name,
    type: param.type,
    isFinal: param.isFinal,
    isVarArgs: param.isVarArgs,
    documentation: paramDocs.get(param.name),
  }));

  return {
    name,
    returnType: isConstructor ? undefined : returnTypeOf(node),
    parameters,
    modifiers: [...node.modifiers],
    annotations: [...node.annotations],
    thrownTypes: [...node.thrownTypes],
    documentation: descriptionOf(node.javadoc),
    returnDocumentation: isConstructor ? undefined : returnDocumentation(node.javadoc),
    isConstructor,
    startLine: node.range.begin.line,
    endLine: node.range.end.line,
  };
}

function returnTypeOf(node: CallableNode): string | undefined {
  return isMethod(node) ? node.returnType : undefined;
}

function isMethod(node: CallableNode): node is MethodDeclarationNode {
  return 'returnType' in node;
}

function descriptionOf(doc: DocCommentNode | undefined): string | undefined {
  const description = doc?.description.trim();
  return description ? description : undefined;
}

/** name → text for every `@param` tag; a repeated name keeps the last tag. */
function paramDocumentation(doc: DocCommentNode | undefined): Map<string, string> {
  const docs = new Map<string, string>();
  for (const tag of doc?.blockTags ?? []) {
    if (tag.kind === 'param' && tag.name) {
      docs.set(tag.name, tag.content.trim());
    }
  }
  return docs;
}

function returnDocumentation(doc: DocCommentNode | undefined): string | undefined {
  const tag = doc?.blockTags.find(t => t.kind === 'return');
  return tag ? tag.content.trim() : undefined;
}

function assertNever(node: never): never {
  throw new InvalidArgumentError('Unknown type declaration variant', { node });
}
