export const TOPIC_SEPARATOR = "/";

/** Matches exactly one topic segment */
export const SINGLE_WILDCARD = "*";

/** Matches one or more trailing topic segments */
export const MULTI_WILDCARD = "**";

const FORBIDDEN_CHARACTERS = /[*+#\s]/;

export class InvalidTopicError extends Error {}

export const isValidSegment = (segment: string): boolean =>
	segment.length > 0 &&
	!segment.includes(TOPIC_SEPARATOR) &&
	!FORBIDDEN_CHARACTERS.test(segment);

/**
 * Concrete topics are non-empty segments joined by "/" without wildcards
 */
export const validateTopic = (topic: string): string => {
	const segments = topic.split(TOPIC_SEPARATOR);
	if (!segments.every(isValidSegment)) {
		throw new InvalidTopicError(`Invalid topic: '${topic}'`);
	}
	return topic;
};

export const validatePattern = (pattern: string): string => {
	const segments = pattern.split(TOPIC_SEPARATOR);
	segments.forEach((segment, ix) => {
		if (segment === MULTI_WILDCARD) {
			if (ix !== segments.length - 1) {
				throw new InvalidTopicError(
					`'${MULTI_WILDCARD}' must be the last segment: '${pattern}'`,
				);
			}
			return;
		}
		if (segment === SINGLE_WILDCARD) {
			return;
		}
		if (!isValidSegment(segment)) {
			throw new InvalidTopicError(`Invalid topic pattern: '${pattern}'`);
		}
	});
	return pattern;
};

export const matchesTopic = (pattern: string, topic: string): boolean => {
	const expected = pattern.split(TOPIC_SEPARATOR);
	const actual = topic.split(TOPIC_SEPARATOR);
	for (let i = 0; i < expected.length; i++) {
		const segment = expected[i];
		if (segment === MULTI_WILDCARD) {
			return actual.length > i;
		}
		if (i >= actual.length) {
			return false;
		}
		if (segment !== SINGLE_WILDCARD && segment !== actual[i]) {
			return false;
		}
	}
	return expected.length === actual.length;
};

export const joinTopic = (...segments: string[]): string =>
	segments.join(TOPIC_SEPARATOR);
