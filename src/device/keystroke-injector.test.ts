import { KeystrokeInjector } from './keystroke-injector';
import { ProcessResult, ProcessRunner } from '../types';
import { RecordingLogger, RecordingRunner } from '../../tests/helpers/fakes';

class UnstartableRunner implements ProcessRunner {
  run(): Promise<ProcessResult> {
    return Promise.reject(new Error('spawn xdotool EACCES'));
  }
}

describe('KeystrokeInjector', () => {
  it('should target the focused window and clear modifiers', async () => {
    const runner = new RecordingRunner();
    const injector = new KeystrokeInjector('xdotool', runner, new RecordingLogger());

    await injector.send(['ctrl+z', 'Escape']);

    expect(runner.calls).toEqual([
      {
        command: 'xdotool',
        args: ['getwindowfocus', 'key', '--window', '%1', '--clearmodifiers', 'ctrl+z', 'Escape'],
      },
    ]);
  });

  it('should not run anything for an empty key list', async () => {
    const runner = new RecordingRunner();
    const injector = new KeystrokeInjector('xdotool', runner, new RecordingLogger());

    await injector.send([]);

    expect(runner.calls).toHaveLength(0);
  });

  it('should warn when the injector fails', async () => {
    const logger = new RecordingLogger();
    const injector = new KeystrokeInjector('xdotool', new RecordingRunner(() => 1), logger);

    await injector.send(['Return']);

    expect(logger.warnings).toEqual(['xdotool exited with code 1']);
  });

  it('should warn when the injector cannot be started', async () => {
    const logger = new RecordingLogger();
    const injector = new KeystrokeInjector('xdotool', new UnstartableRunner(), logger);

    await expect(injector.send(['Return'])).resolves.toBeUndefined();

    expect(logger.warnings).toEqual(['Failed to run xdotool: Error: spawn xdotool EACCES']);
  });
});
