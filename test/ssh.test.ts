import {generateKeyPairSync} from "crypto";
import {createServer, Server as NetServer} from "net";
import {Server, utils} from "ssh2";
import {NodeSpec} from "../hcloud/settings";
import {SshExecutor} from "../provisioner/ssh";
import {silentLogger, testNodes} from "./fake-cluster";

function listen(server: NetServer): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address === null || typeof address === "string") {
                reject(new Error("server has no port"));
                return;
            }
            resolve(address.port);
        });
    });
}

function close(server: NetServer): Promise<void> {
    return new Promise(resolve => server.close(() => resolve()));
}

describe("SshExecutor", () => {
    const {privateKey} = generateKeyPairSync("rsa", {
        modulusLength: 2048,
        privateKeyEncoding: {type: "pkcs1", format: "pem"},
        publicKeyEncoding: {type: "pkcs1", format: "pem"},
    });

    // Commands the server saw, and files written over SFTP.
    const commands: string[] = [];
    const files = new Map<string, Buffer>();

    const server = new Server({hostKeys: [privateKey]}, client => {
        client.on("authentication", ctx => ctx.accept())
            .on("ready", () => {
                client.on("session", acceptSession => {
                    const session = acceptSession();
                    session.on("exec", (accept, _reject, info) => {
                        const stream = accept();
                        commands.push(info.command);
                        if (info.command === "echo one") {
                            stream.write("one\n");
                            stream.exit(0);
                            stream.end();
                        } else if (info.command === "fail") {
                            stream.stderr.write("boom\n");
                            stream.exit(3);
                            stream.end();
                        }
                        // Anything else hangs until the client goes away.
                    });
                    session.on("sftp", acceptSftp => {
                        const sftp = acceptSftp();
                        const handles = new Map<number, string>();
                        sftp.on("OPEN", (reqid, filename) => {
                            const handle = Buffer.alloc(4);
                            handle.writeUInt32BE(handles.size, 0);
                            handles.set(handles.size, filename);
                            files.set(filename, Buffer.alloc(0));
                            sftp.handle(reqid, handle);
                        }).on("WRITE", (reqid, handle, _offset, data) => {
                            const filename = handles.get(handle.readUInt32BE(0));
                            if (filename === undefined) {
                                sftp.status(reqid, utils.sftp.STATUS_CODE.FAILURE);
                                return;
                            }
                            files.set(filename, Buffer.concat([files.get(filename) ?? Buffer.alloc(0), data]));
                            sftp.status(reqid, utils.sftp.STATUS_CODE.OK);
                        }).on("FSETSTAT", reqid => {
                            sftp.status(reqid, utils.sftp.STATUS_CODE.OK);
                        }).on("CLOSE", reqid => {
                            sftp.status(reqid, utils.sftp.STATUS_CODE.OK);
                        });
                    });
                });
            })
            // Clients that abort reset the connection.
            .on("error", err => silentLogger.debug({err}, "ssh test client error"));
    });

    let node: NodeSpec;

    beforeAll(async () => {
        const port = await listen(server);
        node = {...testNodes(1, 0)[0], host: "127.0.0.1", port};
    });

    afterAll(() => close(server));

    beforeEach(() => {
        commands.length = 0;
        files.clear();
    });

    function executor(connectAttempts = 1) {
        return new SshExecutor({username: "root", privateKey, connectAttempts, retryDelay: 10, logger: silentLogger});
    }

    test("stops at the first command that exits non-zero", async () => {
        const result = await executor().execute(node, ["echo one", "fail", "echo never"]);

        expect(result).toEqual({stdout: "one\n", stderr: "boom\n", code: 3});
        expect(commands).toEqual(["echo one", "fail"]);
    });

    test("writes uploads over sftp", async () => {
        await executor().upload(node, "token: test-cluster-token\n", "/etc/rancher/k3s/config.yaml");

        expect(files.get("/etc/rancher/k3s/config.yaml")?.toString("utf8")).toBe("token: test-cluster-token\n");
    });

    test("gives up with a connection error once the attempts are spent", async () => {
        let connections = 0;
        const dropping = createServer(socket => {
            connections++;
            socket.destroy();
        });
        const port = await listen(dropping);
        try {
            await expect(executor(2).execute({...node, port}, ["echo one"]))
                .rejects.toMatchObject({kind: "ConnectionError"});
            expect(connections).toBe(2);
        } finally {
            await close(dropping);
        }
    });

    test("does not connect when already cancelled", async () => {
        await expect(executor().execute(node, ["echo one"], {signal: AbortSignal.abort()}))
            .rejects.toMatchObject({kind: "Cancelled", message: "cancelled while talking to cp-1"});
        expect(commands).toEqual([]);
    });

    test("cancels a command that is still running", async () => {
        const controller = new AbortController();
        const pending = executor().execute(node, ["sleep"], {signal: controller.signal});
        setTimeout(() => controller.abort(), 50);

        await expect(pending).rejects.toMatchObject({kind: "Cancelled", message: "cancelled while talking to cp-1"});
    });
});
