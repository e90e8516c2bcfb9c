export {
	AssemblyProject,
	type GlobalCollision,
	type ProjectSymbol,
	type ResolvedTables,
	resolve,
	resolveTables,
	Visibility,
} from './project.ts'
