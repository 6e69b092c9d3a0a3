import 'dotenv/config';
import { TerminalRenderer } from '../display/TerminalRenderer.js';
import { ADDR } from '../gateway/addresses.js';
import { DisplayStateCell } from '../gateway/DisplayState.js';
import { startListener } from '../gateway/OscListener.js';
import { loadOscTargetFromEnv, OscSender } from '../gateway/OscSender.js';
import { parseArgs, USAGE, type ColorPayload } from './probeArgs.js';

async function sendColor(sender: OscSender, color: ColorPayload): Promise<void> {
  switch (color.kind) {
    case 'hex':
      return sender.sendText(ADDR.color, color.hex);
    case 'ints':
      return sender.sendIntegers(ADDR.color, ...color.values);
    case 'floats':
      return sender.sendNumbers(ADDR.color, ...color.values);
    case 'packed':
      return sender.sendIntegers(ADDR.color, color.value);
  }
}

async function main(): Promise<void> {
  const cmd = parseArgs(process.argv.slice(2));
  if (cmd.kind === 'help') {
    console.log(USAGE);
    return;
  }
  if (cmd.kind === 'osc:listen') {
    const { host, port, durationMs } = cmd;
    const state = new DisplayStateCell();
    const handle = await startListener({ host, port, queueLimit: 1024, state });
    const renderer = new TerminalRenderer({
      intervalMs: 100,
      state,
      stats: () => handle.stats(),
      out: process.stdout,
    });
    await renderer.start();
    console.error(`listening OSC on ${host}:${handle.port}`);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const shutdown = (): void => {
      if (timer) clearTimeout(timer);
      renderer.stop();
      handle.stop().then(
        () => {
          console.error(JSON.stringify(handle.stats()));
          process.exit(0);
        },
        (err: unknown) => {
          console.error(err instanceof Error ? err.message : String(err));
          process.exit(1);
        },
      );
    };
    process.on('SIGINT', shutdown);
    if (typeof durationMs === 'number' && Number.isFinite(durationMs) && durationMs > 0) {
      timer = setTimeout(shutdown, durationMs);
    }
    return; // keep process alive
  }
  const oscSender = new OscSender(loadOscTargetFromEnv());
  try {
    if (cmd.kind === 'osc:text') {
      await oscSender.sendText(cmd.address, cmd.text);
    } else if (cmd.kind === 'osc:color') {
      await sendColor(oscSender, cmd.color);
    } else if (typeof cmd.text === 'string') {
      await oscSender.sendText(cmd.address, cmd.text);
    } else if (cmd.floats && cmd.floats.length > 0) {
      await oscSender.sendNumbers(cmd.address, ...cmd.floats);
    } else if (cmd.ints && cmd.ints.length > 0) {
      await oscSender.sendIntegers(cmd.address, ...cmd.ints);
    } else {
      throw new Error('nothing to send');
    }
    console.log('delivered');
  } finally {
    oscSender.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
