/** Deep freeze helper for configuration snapshots */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
	Object.freeze(obj);
	const values: unknown[] = Object.values(obj);
	for (const value of values) {
		if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
			deepFreeze(value);
		}
	}
	return obj;
}
