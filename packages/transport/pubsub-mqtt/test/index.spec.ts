import { type DataEvent, PubSubClosedError } from "@orbcomm/pubsub-interface";
import { expect } from "chai";
import { type AddressInfo, type Server, type Socket, createServer } from "net";
import {
	type MqttConnection,
	MqttPubSub,
	type QoS,
	toMqttFilter,
} from "../src/index.js";

type MessageListener = (topic: string, payload: Buffer) => void;

class FakeMqttClient implements MqttConnection {
	subscribed: string[] = [];
	unsubscribed: string[] = [];
	published: { topic: string; message: Buffer; qos: QoS }[] = [];
	listeners: Set<MessageListener> = new Set();
	ended = false;
	failSubscribe = false;

	async subscribeAsync(topic: string) {
		if (this.failSubscribe) {
			throw new Error("Not authorized");
		}
		this.subscribed.push(topic);
	}

	async unsubscribeAsync(topic: string) {
		this.unsubscribed.push(topic);
	}

	async publishAsync(topic: string, message: Buffer, options: { qos: QoS }) {
		this.published.push({ topic, message, qos: options.qos });
	}

	on(_event: "message", listener: MessageListener) {
		this.listeners.add(listener);
		return this;
	}

	removeListener(_event: "message", listener: MessageListener) {
		this.listeners.delete(listener);
		return this;
	}

	async endAsync() {
		this.ended = true;
	}

	/** Simulates a message arriving from the broker */
	emit(topic: string, payload: Buffer) {
		for (const listener of this.listeners) {
			listener(topic, payload);
		}
	}
}

describe("mqtt pubsub", () => {
	let client: FakeMqttClient;
	let pubsub: MqttPubSub;

	beforeEach(() => {
		client = new FakeMqttClient();
		pubsub = new MqttPubSub(client, { id: "test", qos: 1 });
	});

	it("maps wildcards to mqtt filters", () => {
		expect(toMqttFilter("orb/a1/**")).equal("orb/a1/#");
		expect(toMqttFilter("orb/*/name")).equal("orb/+/name");
		expect(toMqttFilter("orb/discover")).equal("orb/discover");
	});

	it("subscribes once per pattern", async () => {
		await pubsub.subscribe("orb/a1/**");
		await pubsub.subscribe("orb/a1/**");
		expect(client.subscribed).to.deep.equal(["orb/a1/#"]);

		expect(await pubsub.unsubscribe("orb/a1/**")).to.be.false;
		expect(client.unsubscribed).to.deep.equal([]);
		expect(await pubsub.unsubscribe("orb/a1/**")).to.be.true;
		expect(client.unsubscribed).to.deep.equal(["orb/a1/#"]);
	});

	it("forgets a subscription the broker refused", async () => {
		client.failSubscribe = true;
		try {
			await pubsub.subscribe("orb/discover");
			expect.fail("expected subscribe to fail");
		} catch (error) {
			expect((error as Error).message).equal("Not authorized");
		}
		expect(await pubsub.unsubscribe("orb/discover")).to.be.false;
	});

	it("publishes with the configured qos", async () => {
		await pubsub.publish("orb/a1/name", new Uint8Array([1, 2]));
		expect(client.published).to.have.length(1);
		expect(client.published[0].topic).equal("orb/a1/name");
		expect(client.published[0].qos).equal(1);
		expect([...client.published[0].message]).to.deep.equal([1, 2]);
	});

	it("dispatches messages for subscribed patterns", async () => {
		const received: DataEvent[] = [];
		pubsub.addEventListener("data", (evt) => received.push(evt.detail));
		await pubsub.subscribe("orb/a1/**");

		client.emit("orb/a1/name", Buffer.from([7]));
		client.emit("orb/a2/name", Buffer.from([8]));

		expect(received).to.have.length(1);
		expect(received[0].topic).equal("orb/a1/name");
		expect(received[0].data).to.deep.equal(new Uint8Array([7]));
	});

	it("detaches and ends the client on close", async () => {
		await pubsub.close();
		expect(client.ended).to.be.true;
		expect(client.listeners.size).equal(0);
		try {
			await pubsub.publish("orb/a1/name", new Uint8Array());
			expect.fail("expected publish to fail");
		} catch (error) {
			expect(error).to.be.instanceOf(PubSubClosedError);
		}
	});

	describe("connect", () => {
		let server: Server;
		let sockets: Socket[];

		beforeEach(async () => {
			sockets = [];
			// accepts connections and never answers
			server = createServer((socket) => sockets.push(socket));
			await new Promise<void>((resolve) =>
				server.listen(0, "127.0.0.1", resolve),
			);
		});

		afterEach(async () => {
			sockets.forEach((socket) => socket.destroy());
			await new Promise<void>((resolve) => server.close(() => resolve()));
		});

		it("gives up on a broker that never acknowledges", async () => {
			const { port } = server.address() as AddressInfo;
			const start = Date.now();
			let failure: unknown;
			await MqttPubSub.connect(`mqtt://127.0.0.1:${port}`, {
				connectTimeout: 200,
			}).catch((error) => (failure = error));
			expect(failure).to.be.instanceOf(Error);
			expect(Date.now() - start).to.be.lessThan(2000);
		});
	});
});
