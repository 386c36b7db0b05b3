// ============================================================================
// Flakeprobe - Redaction
// Keeps secrets handed to the subject (DB passwords, API tokens) out of the
// debug log.
// ============================================================================

const SENSITIVE_REGEX = /(?:password|passwd|token|secret|session|auth|credential|api[_-]?key)/i;
const REDACTED_VALUE = '[REDACTED]';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively redacts values stored under sensitive keys.
 * Copy-on-write: untouched branches are returned as-is.
 */
export function redact(obj: unknown): unknown {
	if (Array.isArray(obj)) {
		let copy: unknown[] | null = null;
		for (let i = 0; i < obj.length; i++) {
			const val: unknown = obj[i];
			const redacted = redact(val);
			if (redacted !== val) {
				if (!copy) {
					copy = obj.slice(0, i);
				}
				copy.push(redacted);
			} else if (copy) {
				copy.push(val);
			}
		}
		return copy || obj;
	}

	if (!isRecord(obj)) {
		return obj;
	}

	let copy: Record<string, unknown> | null = null;

	for (const key of Object.keys(obj)) {
		const value = obj[key];
		let newValue = value;

		// Arrays under a sensitive key (e.g. `tokens`) are walked, not blanked
		if (Array.isArray(value)) {
			newValue = redact(value);
		} else if (SENSITIVE_REGEX.test(key)) {
			newValue = REDACTED_VALUE;
		} else {
			newValue = redact(value);
		}

		if (newValue !== value) {
			if (!copy) {
				copy = { ...obj };
			}
			copy[key] = newValue;
		}
	}

	return copy || obj;
}
