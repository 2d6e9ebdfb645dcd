import {AmiActions, connectAndLogin, isAmiError, originate, queueWithTimeout} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    username: string;
    secret: string;
    channel: string;
    context: string;
    exten: string;
    timeoutMs: number;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {
        host: '127.0.0.1',
        username: 'admin',
        secret: '',
        channel: 'PJSIP/100',
        context: 'default',
        exten: '200',
        timeoutMs: 30000,
    };
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
        } else if (arg.startsWith('--channel=')) {
            options.channel = arg.substring('--channel='.length);
        } else if (arg.startsWith('--context=')) {
            options.context = arg.substring('--context='.length);
        } else if (arg.startsWith('--exten=')) {
            options.exten = arg.substring('--exten='.length);
        } else if (arg.startsWith('--timeout=')) {
            const timeoutMs = Number(arg.substring('--timeout='.length));
            if (Number.isInteger(timeoutMs) && timeoutMs > 0) options.timeoutMs = timeoutMs;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));

async function main(): Promise<void> {
    const client = await connectAndLogin({
        host: options.host,
        port: options.port,
        username: options.username,
        secret: options.secret,
        events: 'call',
    });

    client.onEvent('OriginateResponse', (event) => {
        console.log(`Originate finished: ${event.get('Response') ?? 'unknown'} (${event.get('Reason') ?? '-'})`);
        client.end();
    });

    try {
        const response = await queueWithTimeout(client, originate({
            channel: options.channel,
            context: options.context,
            exten: options.exten,
            priority: 1,
            timeoutMs: options.timeoutMs,
            async: true,
        }), options.timeoutMs + 5000);
        console.log(`Originate queued: ${response.message ?? response.status}`);
    } catch (err) {
        if (isAmiError(err)) {
            console.error(`[AmiError] ${err.code}: ${err.message}`);
        }
        await new AmiActions(client).logoff().catch((logoffErr: Error) => {
            console.error('[LogoffError]', logoffErr.message);
        });
        client.close();
        throw err;
    }
}

main().catch((err: Error) => {
    console.error(err.message);
    process.exit(1);
});
