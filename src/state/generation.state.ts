/**
 * Generation State Manager
 * Tracks the single request in flight so a front end can show progress
 */
import { BaseStateManager } from "./base.state";
import type {
	Flashcard,
	GenerationError,
	GenerationRequest,
	GenerationResult,
	GenerationState,
} from "../types";

function createInitialState(): GenerationState {
	return {
		status: "idle",
		request: null,
		flashcards: [],
		error: null,
		startedAt: null,
		finishedAt: null,
	};
}

export class GenerationStateManager extends BaseStateManager<GenerationState> {
	constructor(private readonly clock: () => number = Date.now) {
		super(createInitialState());
	}

	get isGenerating(): boolean {
		return this.state.status === "generating";
	}

	/**
	 * Enter the generating state, clearing any previous outcome
	 */
	start(request: GenerationRequest): void {
		this.setState({
			status: "generating",
			request,
			flashcards: [],
			error: null,
			startedAt: this.clock(),
			finishedAt: null,
		});
	}

	succeed(flashcards: readonly Flashcard[]): void {
		this.setState({ status: "success", flashcards, error: null, finishedAt: this.clock() });
	}

	fail(error: GenerationError): void {
		this.setState({ status: "error", flashcards: [], error, finishedAt: this.clock() });
	}

	/**
	 * Record a pipeline result
	 */
	complete(result: GenerationResult): void {
		if (result.success) {
			this.succeed(result.flashcards);
		} else {
			this.fail(result.error);
		}
	}

	reset(): void {
		this.setState(createInitialState());
	}
}
