import type {FieldDeclaration, TypeExpr} from '../parser/types.js';

/** Printed for type shapes the printer does not handle. */
export const UNKNOWN_TYPE = 'interface{}';

/**
 * Print a type expression. Only identifiers, qualified names, pointers,
 * slices/arrays and maps are printed; anything else is UNKNOWN_TYPE.
 */
export function typeToString(expr: TypeExpr): string {
	switch (expr.kind) {
		case 'ident':
			return expr.name;
		case 'qualified':
			return `${expr.package}.${expr.name}`;
		case 'pointer':
			return `*${typeToString(expr.elem)}`;
		case 'slice':
			return `[]${typeToString(expr.elem)}`;
		case 'map':
			return `map[${typeToString(expr.key)}]${typeToString(expr.value)}`;
		case 'other':
			return UNKNOWN_TYPE;
	}
}

/**
 * One "name type" descriptor per declared name, or a bare "type" when the
 * entry is unnamed.
 */
export function describeFields(fields: readonly FieldDeclaration[]): string[] {
	return fields.flatMap(field => {
		const type = typeToString(field.type);
		return field.names.length > 0
			? field.names.map(name => `${name} ${type}`)
			: [type];
	});
}

/**
 * One type descriptor per result entry, regardless of how many names it
 * declares.
 */
export function describeResults(results: readonly FieldDeclaration[]): string[] {
	return results.map(result => typeToString(result.type));
}
