import {
	MULTI_WILDCARD,
	TOPIC_SEPARATOR,
	isValidSegment,
	joinTopic,
} from "@orbcomm/pubsub-interface";
import { InvalidDeviceIdError } from "./errors.js";

export const ORB_NAMESPACE = "orb";
export const COMMAND_NAMESPACE = "command";

/** Transport wide topic every device answers discovery probes on */
export const DISCOVERY_TOPIC = joinTopic(ORB_NAMESPACE, "discover");

/** Devices publish their identity here when they come online */
export const ANNOUNCE_TOPIC = joinTopic(ORB_NAMESPACE, "announce");

const REPLY_NAMESPACE = "_reply";

const RESERVED_IDS = new Set(["discover", "announce", REPLY_NAMESPACE]);

export const validateDeviceId = (id: string): string => {
	if (!isValidSegment(id) || RESERVED_IDS.has(id)) {
		throw new InvalidDeviceIdError(id);
	}
	return id;
};

/**
 * `orb/{id}/{...path}`
 */
export const deviceTopic = (deviceId: string, ...path: string[]): string =>
	joinTopic(ORB_NAMESPACE, validateDeviceId(deviceId), ...path);

/** Every topic addressed to a device */
export const deviceTopicPattern = (deviceId: string): string =>
	deviceTopic(deviceId, MULTI_WILDCARD);

/** Where the replies to one client session are published */
export const replyInbox = (sessionId: string, ...channel: string[]): string =>
	joinTopic(ORB_NAMESPACE, REPLY_NAMESPACE, sessionId, ...channel);

export type DeviceTopic = {
	deviceId: string;
	/** Segments after the device id */
	path: string[];
};

/**
 * Splits an addressed topic into device id and action path. Returns undefined
 * for topics outside the device namespace.
 */
export const parseDeviceTopic = (topic: string): DeviceTopic | undefined => {
	const [namespace, deviceId, ...path] = topic.split(TOPIC_SEPARATOR);
	if (
		namespace !== ORB_NAMESPACE ||
		deviceId == null ||
		!isValidSegment(deviceId) ||
		RESERVED_IDS.has(deviceId) ||
		path.length === 0
	) {
		return undefined;
	}
	return { deviceId, path };
};
