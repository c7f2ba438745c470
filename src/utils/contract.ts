/**
 * Fails fast when a caller breaks a precondition or an invariant is breached.
 * These are programming errors, not recoverable conditions.
 */
export function assertContract(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new Error(`Contract violation: ${message}`);
    }
}

export function assertActionInRange(action: number, actionCount: number): void {
    assertContract(
        Number.isInteger(action) && action >= 0 && action < actionCount,
        `action ${action} is outside [0, ${actionCount})`,
    );
}
