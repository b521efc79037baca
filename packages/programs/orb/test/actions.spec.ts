import { expect } from "chai";
import {
	ActionRegistry,
	AmbiguousActionError,
	COMMANDS,
	CommandKind,
	DISCOVERY_TOPIC,
	InvalidDeviceIdError,
	QUERIES,
	QueryKind,
	UnknownActionError,
	defaultRegistry,
	deviceTopicPattern,
	parseDeviceTopic,
	replyInbox,
	validateDeviceId,
} from "../src/index.js";

describe("actions", () => {
	describe("registry", () => {
		it("maps every token back to its action", () => {
			for (const kind of defaultRegistry.queries()) {
				const token = defaultRegistry.tokenOf({ type: "query", kind });
				expect(defaultRegistry.parseQuery(token)).equal(kind);
			}
			for (const kind of defaultRegistry.commands()) {
				const token = defaultRegistry.tokenOf({ type: "command", kind });
				expect(defaultRegistry.parseCommand(token)).equal(kind);
			}
		});

		it("lists every action", () => {
			expect(defaultRegistry.queries()).to.deep.equal([
				QueryKind.Name,
				QueryKind.Id,
				QueryKind.HardwareVersion,
			]);
			expect(defaultRegistry.commands()).to.deep.equal([
				CommandKind.Reboot,
				CommandKind.Shutdown,
				CommandKind.ResetGimbal,
			]);
		});

		it("rejects unknown tokens", () => {
			expect(() => defaultRegistry.parseQuery("Name")).to.throw(
				UnknownActionError,
				"Unknown query 'Name'. Expecting one of: name, id, hardware_version",
			);
			expect(() => defaultRegistry.parseCommand("fly")).to.throw(
				UnknownActionError,
				"Unknown command 'fly'. Expecting one of: reboot, shutdown, reset_gimbal",
			);
		});

		it("does not accept a query token as a command", () => {
			expect(() => defaultRegistry.parseCommand("name")).to.throw(
				UnknownActionError,
			);
		});

		it("rejects duplicate tokens", () => {
			expect(
				() =>
					new ActionRegistry({
						queries: {
							...QUERIES,
							[QueryKind.Id]: { token: "name", description: "duplicate" },
						},
						commands: COMMANDS,
					}),
			).to.throw(
				AmbiguousActionError,
				"The query token 'name' is registered more than once",
			);
		});

		it("rejects a query shadowing the command namespace", () => {
			expect(
				() =>
					new ActionRegistry({
						queries: {
							...QUERIES,
							[QueryKind.Name]: { token: "command", description: "" },
						},
						commands: COMMANDS,
					}),
			).to.throw(
				AmbiguousActionError,
				"The query token 'command' collides with the command namespace",
			);
		});

		it("rejects tokens that are not topic segments", () => {
			expect(
				() =>
					new ActionRegistry({
						queries: QUERIES,
						commands: {
							...COMMANDS,
							[CommandKind.Reboot]: {
								token: "re/boot",
								description: "",
								disruptive: true,
								exclusive: false,
							},
						},
					}),
			).to.throw(AmbiguousActionError);
		});

		it("formats actions", () => {
			expect(
				defaultRegistry.format({ type: "command", kind: CommandKind.Reboot }),
			).equal("command:reboot");
		});
	});

	describe("topics", () => {
		it("derives query and command topics", () => {
			expect(defaultRegistry.queryTopic("orb-1", QueryKind.HardwareVersion)).equal(
				"orb/orb-1/hardware_version",
			);
			expect(
				defaultRegistry.commandTopic("orb-1", CommandKind.ResetGimbal),
			).equal("orb/orb-1/command/reset_gimbal");
		});

		it("is deterministic", () => {
			const action = { type: "query", kind: QueryKind.Name } as const;
			expect(defaultRegistry.topicFor("orb-1", action)).equal(
				defaultRegistry.topicFor("orb-1", action),
			);
			expect(defaultRegistry.topicFor("orb-1", action)).not.equal(
				defaultRegistry.topicFor("orb-2", action),
			);
		});

		it("resolves topics back to actions", () => {
			for (const kind of defaultRegistry.queries()) {
				const topic = defaultRegistry.queryTopic("orb-1", kind);
				expect(defaultRegistry.resolve(topic)).to.deep.equal({
					deviceId: "orb-1",
					action: { type: "query", kind },
				});
			}
			for (const kind of defaultRegistry.commands()) {
				const topic = defaultRegistry.commandTopic("orb-1", kind);
				expect(defaultRegistry.resolve(topic)).to.deep.equal({
					deviceId: "orb-1",
					action: { type: "command", kind },
				});
			}
		});

		it("fails to resolve unknown paths", () => {
			expect(() => defaultRegistry.resolve("orb/x/a/b")).to.throw(
				UnknownActionError,
				"Unknown action 'a/b' for device 'x'",
			);
			expect(() => defaultRegistry.resolve("orb/x/command/fly")).to.throw(
				UnknownActionError,
				"Unknown command 'fly'",
			);
			expect(() => defaultRegistry.resolve(DISCOVERY_TOPIC)).to.throw(
				UnknownActionError,
				"Not a device topic: 'orb/discover'",
			);
		});

		it("validates device ids", () => {
			expect(validateDeviceId("orb-1")).equal("orb-1");
			for (const id of ["", "a/b", "a b", "*", "a+", "#", "discover"]) {
				expect(() => validateDeviceId(id)).to.throw(InvalidDeviceIdError);
			}
			expect(() =>
				defaultRegistry.queryTopic("a/b", QueryKind.Name),
			).to.throw(
				InvalidDeviceIdError,
				"Invalid device id 'a/b'. Ids must be non-empty and contain no '/', wildcards or whitespace",
			);
		});

		it("parses device topics", () => {
			expect(parseDeviceTopic("orb/o1/command/reboot")).to.deep.equal({
				deviceId: "o1",
				path: ["command", "reboot"],
			});
			expect(parseDeviceTopic("orb/o1")).to.be.undefined;
			expect(parseDeviceTopic("orb/announce/x")).to.be.undefined;
			expect(parseDeviceTopic("other/o1/name")).to.be.undefined;
		});

		it("builds device patterns and inboxes", () => {
			expect(deviceTopicPattern("o1")).equal("orb/o1/**");
			expect(replyInbox("s1")).equal("orb/_reply/s1");
			expect(replyInbox("s1", "discover")).equal("orb/_reply/s1/discover");
		});
	});
});
