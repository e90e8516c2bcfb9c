export {
	type AssemblyDefine,
	type AssemblyFile,
	type AssemblyFileBuilder,
	type AssemblyItem,
	type AssemblyMacro,
	createAssemblyFile,
	DEFAULT_BITS,
	describeSection,
	isSubLabel,
	type LabelItem,
	labelsIn,
	type MacroCallItem,
	pushItem,
	Section,
	sectionFromName,
} from './file.ts'
