export { FactStore } from './store.ts'
export {
	type ContractId,
	contractId,
	contractIdOf,
	createFact,
	describeFact,
	type VariantSetFact,
	type VariantSetFactInit,
} from './types.ts'
