import {AmiActions, connectAndLogin} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    username: string;
    secret: string;
    tls: boolean;
    filter: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: '127.0.0.1', username: 'admin', secret: '', tls: false, filter: '*'};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--username=')) {
            options.username = arg.substring('--username='.length);
        } else if (arg.startsWith('--secret=')) {
            options.secret = arg.substring('--secret='.length);
        } else if (arg.startsWith('--event=')) {
            options.filter = arg.substring('--event='.length);
        } else if (arg === '--tls') {
            options.tls = true;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));

async function main(): Promise<void> {
    const client = await connectAndLogin({
        host: options.host,
        port: options.port,
        transport: options.tls ? 'tls' : 'tcp',
        username: options.username,
        secret: options.secret,
        events: 'on',
    });
    console.log(`Logged in to ${options.host} (${client.greeting ?? 'no banner'})`);

    client.onEvent(options.filter, (event) => {
        const fields = event.fields.fields()
            .filter((field) => field.name !== 'Event')
            .map((field) => `${field.name}=${field.value}`)
            .join(' ');
        console.log(`[${event.name}] ${fields}`);
    });

    client.on('close', (hadError) => {
        console.log(`Disconnected (hadError=${hadError})`);
    });

    client.on('error', (error) => {
        console.error('[AmiError]', error.code, error.message);
    });

    const actions = new AmiActions(client);
    const uptime = await actions.command('core show uptime');
    for (const line of uptime) console.log(line);

    const shutdown = (): void => {
        void actions.logoff().catch((err: Error) => {
            console.error('[LogoffError]', err.message);
        }).finally(() => client.end());
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err: Error) => {
    console.error(err.message);
    process.exit(1);
});
