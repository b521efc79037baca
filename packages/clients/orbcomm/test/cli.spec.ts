import {
	type CommandExecutor,
	OrbClient,
	OrbServer,
	ShellCommandExecutor,
} from "@orbcomm/orb";
import { MemoryNetwork } from "@orbcomm/pubsub-memory";
import { delay, waitForResolved } from "@orbcomm/time";
import { expect } from "chai";
import { Chalk } from "chalk";
import pDefer from "p-defer";
import { type AddressInfo, type Server, type Socket, createServer } from "net";
import { type CliContext, cli, connectBroker } from "../src/cli.js";

describe("cli", () => {
	let network: MemoryNetwork;
	let out: string[];
	let err: string[];
	let brokers: string[];
	let servers: OrbServer[];

	const executor: CommandExecutor = new ShellCommandExecutor({
		runner: async () => undefined,
	});

	const context = (overrides?: Partial<CliContext>): Partial<CliContext> => ({
		connect: async (broker) => {
			brokers.push(broker);
			return network.connect();
		},
		stdout: (line) => out.push(line),
		stderr: (line) => err.push(line),
		chalk: new Chalk({ level: 0 }),
		env: {},
		configPath: "/nonexistent/orbcomm/config.json",
		properties: {
			env: {},
			readFile: async () => {
				throw new Error("missing");
			},
			run: async () => {
				throw new Error("missing");
			},
		},
		executor,
		...overrides,
	});

	const serve = async (id: string) => {
		const server = new OrbServer({
			pubsub: network.connect(id),
			properties: { id, name: "Orb " + id, hardwareVersion: "EVT4" },
			executor,
		});
		await server.open();
		servers.push(server);
		return server;
	};

	beforeEach(() => {
		network = new MemoryNetwork();
		out = [];
		err = [];
		brokers = [];
		servers = [];
	});

	afterEach(async () => {
		await Promise.all(servers.map((server) => server.close()));
		await network.stop();
	});

	describe("ping", () => {
		it("prints every orb", async () => {
			await serve("orb-b");
			await serve("orb-a");
			const code = await cli(["ping", "--timeout", "100"], context());
			expect(code).equal(0);
			expect(out).to.deep.equal(["orb-a", "orb-b"]);
		});

		it("succeeds when nobody answers", async () => {
			const code = await cli(["ping", "--timeout", "50"], context());
			expect(code).equal(0);
			expect(out).to.deep.equal([]);
			expect(err).to.deep.equal(["No orbs found"]);
		});

		it("connects to the default broker", async () => {
			await cli(["ping", "--timeout", "10"], context());
			expect(brokers).to.deep.equal(["mqtt://localhost:1883"]);
		});

		it("takes the broker from the environment", async () => {
			await cli(
				["ping", "--timeout", "10"],
				context({ env: { ORBCOMM_BROKER: "mqtt://env:1883" } }),
			);
			expect(brokers).to.deep.equal(["mqtt://env:1883"]);
		});

		it("prefers the broker flag", async () => {
			await cli(
				["ping", "--timeout", "10", "--broker", "mqtt://flag:1883"],
				context({ env: { ORBCOMM_BROKER: "mqtt://env:1883" } }),
			);
			expect(brokers).to.deep.equal(["mqtt://flag:1883"]);
		});
	});

	describe("query", () => {
		it("prints the value", async () => {
			await serve("orb-a");
			const code = await cli(
				["query", "--id", "orb-a", "hardware_version"],
				context(),
			);
			expect(code).equal(0);
			expect(out).to.deep.equal(["EVT4"]);
		});

		it("fails on unknown tokens without connecting", async () => {
			const code = await cli(["query", "--id", "orb-a", "serial"], context());
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"UnknownAction: Unknown query 'serial'. Expecting one of: name, id, hardware_version",
			]);
			expect(brokers).to.deep.equal([]);
		});

		it("fails on invalid ids without connecting", async () => {
			const code = await cli(["query", "--id", "a/b", "name"], context());
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"InvalidDeviceId: Invalid device id 'a/b'. Ids must be non-empty and contain no '/', wildcards or whitespace",
			]);
			expect(brokers).to.deep.equal([]);
		});

		it("fails when nobody answers", async () => {
			const code = await cli(
				["query", "--id", "ghost", "name", "--timeout", "50"],
				context(),
			);
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"NoResponse: No reply to query:name from 'ghost' within 50ms",
			]);
		});

		it("requires a device id", async () => {
			const code = await cli(["query", "name"], context());
			expect(code).equal(1);
			expect(err).to.deep.equal(["Missing required argument: id"]);
			expect(brokers).to.deep.equal([]);
		});
	});

	describe("command", () => {
		it("prints the acknowledgement", async () => {
			await serve("orb-a");
			const code = await cli(
				["command", "--id", "orb-a", "reset_gimbal"],
				context(),
			);
			expect(code).equal(0);
			expect(out).to.deep.equal(["Reset gimbal command executed successfully"]);
		});

		it("fails with an ambiguous outcome when nobody answers", async () => {
			const code = await cli(
				["command", "--id", "ghost", "reboot", "--timeout", "50"],
				context(),
			);
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"AmbiguousOutcome: No reply to command:reboot from 'ghost' within 50ms. The command may or may not have been executed",
			]);
		});
	});

	describe("connect", () => {
		it("gives up on a broker that does not connect in time", async () => {
			const code = await cli(
				["query", "--id", "orb-a", "name", "--timeout", "100"],
				context({ connect: () => new Promise(() => undefined) }),
			);
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"Transport: Could not connect to mqtt://localhost:1883 within 100ms",
			]);
		});

		it("reports connection failures as transport errors", async () => {
			const code = await cli(
				["command", "--id", "orb-a", "reboot"],
				context({
					connect: async () => {
						throw new Error("connect ECONNREFUSED 127.0.0.1:1883");
					},
				}),
			);
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"Transport: Failed to connect to mqtt://localhost:1883: connect ECONNREFUSED 127.0.0.1:1883",
			]);
		});

		describe("silent broker", () => {
			let server: Server;
			let sockets: Socket[];

			beforeEach(async () => {
				sockets = [];
				server = createServer((socket) => sockets.push(socket));
				await new Promise<void>((resolve) =>
					server.listen(0, "127.0.0.1", resolve),
				);
			});

			afterEach(async () => {
				sockets.forEach((socket) => socket.destroy());
				await new Promise<void>((resolve) => server.close(() => resolve()));
			});

			it("exits when the broker never acknowledges", async () => {
				const { port } = server.address() as AddressInfo;
				const start = Date.now();
				const code = await cli(
					[
						"query",
						"--id",
						"orb-a",
						"name",
						"--timeout",
						"300",
						"--broker",
						`mqtt://127.0.0.1:${port}`,
					],
					context({ connect: connectBroker }),
				);
				expect(code).equal(1);
				expect(err).to.have.length(1);
				expect(err[0]).to.match(/^Transport: /);
				expect(Date.now() - start).to.be.lessThan(2000);
			});
		});
	});

	describe("serve", () => {
		it("answers until shut down", async () => {
			const shutdown = pDefer<void>();
			const running = cli(
				[
					"serve",
					"--id",
					"orb-s",
					"--name",
					"served",
					"--hardware-version",
					"DVT1",
				],
				context({ waitForShutdown: () => shutdown.promise }),
			);

			const client = new OrbClient({ pubsub: network.connect() });
			await client.open();
			await waitForResolved(() =>
				expect(out).to.deep.equal(["Serving orb orb-s (served, DVT1)"]),
			);
			expect(await client.query("orb-s", "name")).equal("served");
			expect(await client.query("orb-s", "hardware_version")).equal("DVT1");

			shutdown.resolve();
			expect(await running).equal(0);
			await client.close();
		});

		it("falls back to default properties", async () => {
			const shutdown = pDefer<void>();
			const running = cli(
				["serve"],
				context({ waitForShutdown: () => shutdown.promise }),
			);
			await waitForResolved(() =>
				expect(out).to.deep.equal([
					"Serving orb UnknownOrb (DevOrb, UnknownHWVersion)",
				]),
			);
			shutdown.resolve();
			expect(await running).equal(0);
		});

		it("rejects invalid ids", async () => {
			const code = await cli(["serve", "--id", "a/b"], context());
			expect(code).equal(1);
			expect(err).to.deep.equal([
				"InvalidDeviceId: Invalid device id 'a/b'. Ids must be non-empty and contain no '/', wildcards or whitespace",
			]);
		});
	});

	describe("watch", () => {
		it("prints announcements", async () => {
			const watching = cli(["watch", "--duration", "300"], context());
			await delay(50);
			await serve("orb-a");
			expect(await watching).equal(0);
			expect(out).to.deep.equal(["orb-a\tOrb orb-a\tEVT4"]);
		});
	});

	it("requires a command", async () => {
		const code = await cli([], context());
		expect(code).equal(1);
		expect(err).to.have.length(1);
	});
});
