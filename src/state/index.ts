/**
 * Central export for state managers
 */
export {
	BaseStateManager,
	type StateListener,
	type StateSelector,
} from "./base.state";
export { GenerationStateManager } from "./generation.state";
