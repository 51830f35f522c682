/**
 * Base State Manager
 * Listener bookkeeping shared by observable state holders
 */

/**
 * Generic state listener type
 */
export type StateListener<T> = (state: T, prevState: T) => void;

/**
 * State selector type for selective subscriptions
 */
export type StateSelector<T, S> = (state: T) => S;

/**
 * Abstract base class for state managers
 *
 * @template T - The state type managed by this manager
 */
export abstract class BaseStateManager<T extends object> {
	protected state: T;
	private listeners: Set<StateListener<T>> = new Set();

	constructor(initialState: T) {
		this.state = initialState;
	}

	/**
	 * Current state as a shallow copy
	 */
	getState(): T {
		return { ...this.state };
	}

	/**
	 * Merge a partial update and notify listeners
	 */
	protected setState(partial: Partial<T>): void {
		const prevState = this.state;
		this.state = { ...this.state, ...partial };
		this.notifyListeners(prevState);
	}

	/**
	 * Subscribe to every change
	 * @returns Unsubscribe function
	 */
	subscribe(listener: StateListener<T>): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Subscribe to one selected value; fires only when it changes (===)
	 * @returns Unsubscribe function
	 */
	subscribeToSelector<S>(
		selector: StateSelector<T, S>,
		listener: (value: S, prevValue: S) => void
	): () => void {
		let prevValue = selector(this.state);

		const wrappedListener: StateListener<T> = (state) => {
			const newValue = selector(state);
			if (newValue !== prevValue) {
				const oldValue = prevValue;
				prevValue = newValue;
				listener(newValue, oldValue);
			}
		};

		return this.subscribe(wrappedListener);
	}

	private notifyListeners(prevState: T): void {
		const currentState = this.state;
		this.listeners.forEach((listener) => {
			try {
				listener(currentState, prevState);
			} catch (error) {
				// One broken listener must not stop the others
				console.error("[BaseStateManager] Error in state listener:", error);
			}
		});
	}
}
