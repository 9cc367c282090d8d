export type TypeKind = 'class' | 'interface' | 'enum' | 'record' | 'annotation';

export type Visibility = 'public' | 'protected' | 'private' | 'package-private';

export interface Parameter {
  name: string;
  /** Element type; varargs are flagged, not suffixed with `...` */
  type: string;
  isFinal: boolean;
  isVarArgs: boolean;
  documentation?: string;
}

export interface FieldMember {
  name: string;
  type: string;
  modifiers: string[];
  initializer?: string;
  documentation?: string;
  line: number;
}

export interface MethodMember {
  name: string;
  /** Absent for constructors */
  returnType?: string;
  parameters: Parameter[];
  modifiers: string[];
  annotations: string[];
  thrownTypes: string[];
  documentation?: string;
  returnDocumentation?: string;
  isConstructor: boolean;
  startLine: number;
  endLine: number;
}

export interface TypeDeclaration {
  name: string;
  /** Enclosing namespace + "." + name; nested types chain their parent's name */
  qualifiedName: string;
  kind: TypeKind;
  modifiers: string[];
  superClass?: string;
  interfaces: string[];
  typeParameters: string[];
  annotations: string[];
  documentation?: string;
  startLine: number;
  endLine: number;
  fields: FieldMember[];
  /** Constructors first, then methods, each in source order */
  methods: MethodMember[];
  nestedTypes: TypeDeclaration[];
}

export function qualify(namespace: string | undefined, name: string): string {
  return namespace ? `${namespace}.${name}` : name;
}

export function visibilityOf(modifiers: string[]): Visibility {
  if (modifiers.includes('public')) return 'public';
  if (modifiers.includes('protected')) return 'protected';
  if (modifiers.includes('private')) return 'private';
  return 'package-private';
}

export function lineSpan(startLine: number, endLine: number): number {
  return startLine > 0 && endLine > 0 ? endLine - startLine + 1 : 0;
}

export function fullParameterType(param: Parameter): string {
  return param.isVarArgs ? `${param.type}...` : param.type;
}

export function parameterSignature(param: Parameter): string {
  return `${param.isFinal ? 'final ' : ''}${fullParameterType(param)} ${param.name}`;
}

export function fieldSignature(field: FieldMember): string {
  const prefix = field.modifiers.length > 0 ? `${field.modifiers.join(' ')} ` : '';
  return `${prefix}${field.type} ${field.name}`;
}

/** e.g. `public static int parse(String text) throws IOException` */
export function methodSignature(method: MethodMember): string {
  const parts: string[] = [];
  if (method.modifiers.length > 0) parts.push(method.modifiers.join(' '));
  if (!method.isConstructor && method.returnType) parts.push(method.returnType);

  const params = method.parameters.map(p => `${fullParameterType(p)} ${p.name}`).join(', ');
  parts.push(`${method.name}(${params})`);

  let signature = parts.join(' ');
  if (method.thrownTypes.length > 0) {
    signature += ` throws ${method.thrownTypes.join(', ')}`;
  }
  return signature;
}

/** Name plus parameter types only, e.g. `parse(String, int)` */
export function shortSignature(method: MethodMember): string {
  return `${method.name}(${method.parameters.map(fullParameterType).join(', ')})`;
}

export function typeSignature(type: TypeDeclaration): string {
  let signature = type.modifiers.length > 0 ? `${type.modifiers.join(' ')} ` : '';
  signature += `${type.kind} ${type.name}`;
  if (type.typeParameters.length > 0) {
    signature += `<${type.typeParameters.join(', ')}>`;
  }
  if (type.superClass) {
    signature += ` extends ${type.superClass}`;
  }
  if (type.interfaces.length > 0) {
    signature += ` implements ${type.interfaces.join(', ')}`;
  }
  return signature;
}

export function constructorsOf(type: TypeDeclaration): MethodMember[] {
  return type.methods.filter(m => m.isConstructor);
}

export function regularMethodsOf(type: TypeDeclaration): MethodMember[] {
  return type.methods.filter(m => !m.isConstructor);
}

export function publicMethodsOf(type: TypeDeclaration): MethodMember[] {
  return type.methods.filter(m => m.modifiers.includes('public'));
}

export function publicFieldsOf(type: TypeDeclaration): FieldMember[] {
  return type.fields.filter(f => f.modifiers.includes('public'));
}

/** Pre-order walk over a forest of declarations and their nested types. */
export function* walkTypes(types: TypeDeclaration[]): Generator<TypeDeclaration> {
  for (const type of types) {
    yield type;
    yield* walkTypes(type.nestedTypes);
  }
}

/** Methods and constructors across the forest, nested types included. */
export function countMethods(types: TypeDeclaration[]): number {
  let count = 0;
  for (const type of walkTypes(types)) {
    count += type.methods.length;
  }
  return count;
}
