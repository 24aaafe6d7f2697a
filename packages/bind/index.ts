/**
 * @conform/bind
 *
 * Models and call wrappers built on the contract engine.
 */

export {
	overrideTypes,
	type Parameter,
	type Signature,
	validateAsyncCall,
	validateCall,
} from "./call"
export {
	type CallIssue,
	CallError,
	type CallPhase,
	type ModelIssue,
	ModelError,
	SignatureError,
} from "./errors"
export {
	defineModel,
	type FieldMap,
	type Model,
	type ModelDefinition,
	type ModelFailure,
	type ModelInstance,
} from "./model"
export { formatCallIssues, formatModelIssues } from "./report"
