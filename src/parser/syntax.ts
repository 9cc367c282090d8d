/**
 * Typed syntax tree consumed by the structure extractor.
 *
 * Parser plugins lower their concrete trees into these shapes; nothing past
 * this boundary sees a tree-sitter node.
 */

export interface SourcePosition {
  line: number;
  column: number;
}

export interface SourceRange {
  begin: SourcePosition;
  end: SourcePosition;
}

export interface DocTagNode {
  /** Tag name without the `@`, e.g. `param`, `return`, `throws` */
  kind: string;
  /** Tag argument for tags that take one (`@param name`, `@throws Type`) */
  name?: string;
  content: string;
}

export interface DocCommentNode {
  description: string;
  blockTags: DocTagNode[];
}

export interface ImportNode {
  name: string;
  isStatic: boolean;
  isAsterisk: boolean;
}

export interface ParameterNode {
  name: string;
  type: string;
  isFinal: boolean;
  isVarArgs: boolean;
}

export interface VariableDeclaratorNode {
  name: string;
  initializer?: string;
  range: SourceRange;
}

export interface FieldDeclarationNode {
  modifiers: string[];
  type: string;
  javadoc?: DocCommentNode;
  variables: VariableDeclaratorNode[];
  range: SourceRange;
}

export interface CallableNode {
  name: string;
  modifiers: string[];
  annotations: string[];
  parameters: ParameterNode[];
  thrownTypes: string[];
  javadoc?: DocCommentNode;
  range: SourceRange;
}

export interface MethodDeclarationNode extends CallableNode {
  returnType: string;
}

export type ConstructorDeclarationNode = CallableNode;

interface TypeDeclarationBase {
  name: string;
  modifiers: string[];
  annotations: string[];
  javadoc?: DocCommentNode;
  range: SourceRange;
  fields: FieldDeclarationNode[];
  constructors: ConstructorDeclarationNode[];
  methods: MethodDeclarationNode[];
  /** Type declarations whose direct parent is this declaration */
  members: TypeDeclarationNode[];
}

export interface ClassOrInterfaceDeclarationNode extends TypeDeclarationBase {
  variant: 'classOrInterface';
  isInterface: boolean;
  extendedTypes: string[];
  implementedTypes: string[];
  typeParameters: string[];
}

export interface EnumDeclarationNode extends TypeDeclarationBase {
  variant: 'enum';
}

export interface RecordDeclarationNode extends TypeDeclarationBase {
  variant: 'record';
}

export interface AnnotationDeclarationNode extends TypeDeclarationBase {
  variant: 'annotation';
}

export type TypeDeclarationNode =
  | ClassOrInterfaceDeclarationNode
  | EnumDeclarationNode
  | RecordDeclarationNode
  | AnnotationDeclarationNode;

export interface CompilationUnitNode {
  packageName?: string;
  imports: ImportNode[];
  /**
   * Type declarations with no type-declaration parent, in source order:
   * top-level types, plus local types declared inside bodies.
   */
  types: TypeDeclarationNode[];
  range: SourceRange;
}
