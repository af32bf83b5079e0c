import * as fs from 'fs';
import * as path from 'path';
import { StateActivator, physicalSlot, statusLedValue } from './activator';
import { StateStore } from './state-store';
import { IconConverter } from '../device/icon-converter';
import { DeviceHandle, STATUS_LED_OFF } from '../types';
import { ProfileFixture } from '../../tests/helpers/profile';
import {
  RecordingDevice,
  RecordingLogger,
  RecordingRunner,
  RunHandler,
} from '../../tests/helpers/fakes';

const SELF = '/usr/local/bin/padstate';
const CONVERTER = 'img2raw';

/** A tablet whose sysfs attributes are not writable for us */
class ReadOnlyDevice implements DeviceHandle {
  constructor(
    readonly id: string,
    private readonly refusedSlots: ReadonlyArray<number> = [0, 1, 2, 3, 4, 5, 6, 7],
    private readonly refuseLed: boolean = true
  ) {}

  setStatusLed(): void {
    if (this.refuseLed) throw new Error('EACCES: permission denied');
  }

  setButtonImage(slot: number): void {
    if (this.refusedSlots.includes(slot)) throw new Error('EACCES: permission denied');
  }
}

describe('statusLedValue', () => {
  it('should pass the value through for right-handed use', () => {
    expect([1, 2, 3].map((v) => statusLedValue(v, false))).toEqual([1, 2, 3]);
  });

  it('should mirror the value for left-handed use', () => {
    expect([1, 2, 3].map((v) => statusLedValue(v, true))).toEqual([2, 1, 0]);
  });

  it('should return the original value when mirrored twice', () => {
    for (const v of [1, 2, 3]) {
      expect(3 - statusLedValue(v, true)).toBe(v);
    }
  });

  it('should keep "off" as is', () => {
    expect(statusLedValue(null, false)).toBe(STATUS_LED_OFF);
    expect(statusLedValue(null, true)).toBe(STATUS_LED_OFF);
  });
});

describe('physicalSlot', () => {
  it('should map buttons 1-8 to slots 0-7', () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((b) => physicalSlot(b, false))).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it('should reverse the slots for left-handed use', () => {
    expect([1, 2, 3, 4, 5, 6, 7, 8].map((b) => physicalSlot(b, true))).toEqual([7, 6, 5, 4, 3, 2, 1, 0]);
  });

  it('should return the original slot when mirrored twice', () => {
    for (let button = 1; button <= 8; button++) {
      expect(7 - physicalSlot(button, true)).toBe(button - 1);
    }
  });
});

describe('StateActivator', () => {
  let profile: ProfileFixture;
  let store: StateStore;
  let logger: RecordingLogger;
  let device: RecordingDevice;

  beforeEach(() => {
    profile = new ProfileFixture();
    store = new StateStore(profile.root);
    logger = new RecordingLogger();
    device = new RecordingDevice();
  });

  afterEach(() => {
    profile.cleanup();
  });

  function createActivator(
    options: { handler?: RunHandler; devices?: DeviceHandle[]; converterOnPath?: boolean } = {}
  ): { activator: StateActivator; runner: RecordingRunner } {
    const runner = new RecordingRunner(options.handler);
    const searchPath = options.converterOnPath === false ? profile.tools() : profile.tools(CONVERTER);
    const converter = new IconConverter(CONVERTER, runner, logger, searchPath);
    const activator = new StateActivator({
      store,
      devices: options.devices ?? [device],
      runner,
      converter,
      selfCommand: SELF,
      logger,
    });
    return { activator, runner };
  }

  describe('activate', () => {
    it('should ignore targets that are not directories', async () => {
      const a = profile.state('a');
      store.setCurrent(a);
      const stay = profile.file('a/5-stay');
      const { activator, runner } = createActivator();

      expect(await activator.activate(stay)).toBeNull();
      expect(await activator.activate(profile.path('missing'))).toBeNull();

      expect(profile.pointer()).toBe(a);
      expect(runner.calls).toHaveLength(0);
      expect(device.writes).toHaveLength(0);
    });

    it('should repoint the pointer before running _init', async () => {
      const a = profile.state('a');
      const hook = profile.executable('a/_init');
      let pointerDuringHook: string | null = null;
      const { activator, runner } = createActivator({
        handler: (command) => {
          if (command === hook) pointerDuringHook = profile.pointer();
        },
      });

      const result = await activator.activate(a);

      expect(result).toBe(a);
      expect(pointerDuringHook).toBe(a);
      expect(runner.calls[0]).toEqual({ command: hook, args: [SELF] });
    });

    it('should continue with device sync when _init fails', async () => {
      const a = profile.state('a');
      const hook = profile.executable('a/_init');
      profile.file('a/_status', '1');
      const { activator } = createActivator({
        handler: (command) => (command === hook ? 2 : 0),
      });

      await activator.activate(a);

      expect(logger.warnings).toContain(`${hook} exited with code 2`);
      expect(device.ledValues()).toEqual([1]);
    });

    it('should sync the state a hook switched to', async () => {
      const a = profile.state('a');
      const b = profile.state('b');
      profile.file('b/_status', '3');
      const hook = profile.executable('a/_init');
      const { activator } = createActivator({
        handler: (command) => {
          if (command === hook) store.setCurrent(b);
        },
      });

      const result = await activator.activate(a);

      expect(result).toBe(a);
      expect(profile.pointer()).toBe(b);
      expect(device.ledValues()).toEqual([3]);
    });

    it('should stop after the hook when no devices are present', async () => {
      const a = profile.state('a');
      profile.file('a/1.png');
      const { activator, runner } = createActivator({ devices: [] });

      await activator.activate(a);

      expect(profile.pointer()).toBe(a);
      expect(runner.calls).toHaveLength(0);
    });

    it('should canonicalise a symlinked target', async () => {
      const b = profile.state('b');
      profile.state('a');
      const link = profile.link('a/1-next', '../b');
      const { activator } = createActivator();

      expect(await activator.activate(link)).toBe(b);
      expect(profile.pointer()).toBe(b);
    });
  });

  describe('icon conversion', () => {
    it('should convert images without a raw icon and create the blank icon', async () => {
      const a = profile.state('a');
      profile.file('a/1.png');
      profile.file('a/1.raw', 'one');
      profile.file('a/2.png');
      const { activator, runner } = createActivator();

      await activator.activate(a);

      expect(runner.calls).toEqual([
        { command: CONVERTER, args: [path.join(a, '2.png')], options: { quiet: true } },
        { command: CONVERTER, args: ['--blank', store.blankIconPath], options: { quiet: true } },
      ]);
    });

    it('should pass --lefthanded when the marker is present', async () => {
      const a = profile.state('a');
      profile.file('a/2.png');
      profile.file('blank.raw', 'blank');
      profile.file('_lefthanded');
      const { activator, runner } = createActivator();

      await activator.activate(a);

      expect(runner.calls).toEqual([
        { command: CONVERTER, args: ['--lefthanded', path.join(a, '2.png')], options: { quiet: true } },
      ]);
    });

    it('should show freshly converted icons', async () => {
      const a = profile.state('a');
      profile.file('a/2.png');
      const { activator } = createActivator({
        handler: (_command, args) => {
          if (args[0] === '--blank') {
            fs.writeFileSync(args[1], 'blank');
          } else {
            fs.writeFileSync(args[0].replace(/\.png$/, '.raw'), 'two');
          }
        },
      });

      await activator.activate(a);

      expect(device.images()).toEqual([
        { slot: 0, image: 'blank' },
        { slot: 1, image: 'two' },
        { slot: 2, image: 'blank' },
        { slot: 3, image: 'blank' },
        { slot: 4, image: 'blank' },
        { slot: 5, image: 'blank' },
        { slot: 6, image: 'blank' },
        { slot: 7, image: 'blank' },
      ]);
    });

    it('should tolerate failing conversions', async () => {
      const a = profile.state('a');
      profile.file('a/2.png');
      profile.file('a/_status', '2');
      const { activator } = createActivator({ handler: () => 1 });

      await activator.activate(a);

      expect(logger.warnings).toHaveLength(0);
      expect(device.ledValues()).toEqual([2]);
      expect(device.images()).toEqual([]);
    });

    it('should warn once and skip conversion without the converter', async () => {
      const a = profile.state('a');
      profile.file('a/1.png');
      profile.file('a/2.png');
      profile.file('a/3.raw', 'three');
      const { activator, runner } = createActivator({ converterOnPath: false });

      await activator.activate(a);

      expect(runner.calls).toHaveLength(0);
      expect(logger.warnings).toEqual(['icon converter not found, unable to convert images']);
      expect(device.images()).toEqual([{ slot: 2, image: 'three' }]);
    });
  });

  describe('device sync', () => {
    it('should write the status LED to every device', async () => {
      const a = profile.state('a');
      profile.file('a/_status', '2');
      const second = new RecordingDevice('tablet1');
      const { activator } = createActivator({ devices: [device, second] });

      await activator.activate(a);

      expect(device.ledValues()).toEqual([2]);
      expect(second.ledValues()).toEqual([2]);
    });

    it('should mirror the status LED for left-handed use', async () => {
      const a = profile.state('a');
      profile.file('a/_status', '1');
      profile.file('_lefthanded');
      const { activator } = createActivator();

      await activator.activate(a);

      expect(device.ledValues()).toEqual([2]);
    });

    it('should turn the status LED off without _status', async () => {
      const a = profile.state('a');
      profile.file('_lefthanded');
      const { activator } = createActivator();

      await activator.activate(a);

      expect(device.ledValues()).toEqual([STATUS_LED_OFF]);
    });

    it('should show the blank icon on slot 4 for a missing 5.raw', async () => {
      const a = profile.state('a');
      profile.file('blank.raw', 'blank');
      for (const button of [1, 2, 3, 4, 6, 7, 8]) {
        profile.file(`a/${button}.raw`, `icon${button}`);
      }
      const { activator } = createActivator();

      await activator.activate(a);

      expect(device.images()).toContainEqual({ slot: 4, image: 'blank' });
      expect(device.images()).toContainEqual({ slot: 0, image: 'icon1' });
      expect(device.images()).toHaveLength(8);
    });

    it('should show the blank icon on slot 3 for a missing 5.raw when left-handed', async () => {
      const a = profile.state('a');
      profile.file('blank.raw', 'blank');
      profile.file('_lefthanded');
      for (const button of [1, 2, 3, 4, 6, 7, 8]) {
        profile.file(`a/${button}.raw`, `icon${button}`);
      }
      const { activator } = createActivator();

      await activator.activate(a);

      expect(device.images()).toContainEqual({ slot: 3, image: 'blank' });
      expect(device.images()).toContainEqual({ slot: 7, image: 'icon1' });
      expect(device.images()).toHaveLength(8);
    });

    it('should leave slots alone without an icon or blank icon', async () => {
      const a = profile.state('a');
      profile.file('a/4.raw', 'four');
      const { activator } = createActivator({ converterOnPath: false });

      await activator.activate(a);

      expect(device.writes).toEqual([
        { kind: 'led', value: STATUS_LED_OFF },
        { kind: 'image', slot: 3, image: 'four' },
      ]);
    });

    it('should repeat the same writes when activated twice', async () => {
      const a = profile.state('a');
      profile.file('a/_status', '3');
      profile.file('a/1.raw', 'one');
      profile.file('a/6.raw', 'six');
      profile.file('blank.raw', 'blank');
      const { activator, runner } = createActivator();

      await activator.activate(a);
      const first = [...device.writes];
      device.writes.length = 0;
      await activator.activate(a);

      expect(device.writes).toEqual(first);
      expect(first).toHaveLength(9);
      expect(runner.calls).toHaveLength(0);
    });

    it('should keep writing to other devices when one refuses', async () => {
      const a = profile.state('a');
      profile.file('a/_status', '2');
      profile.file('blank.raw', 'blank');
      const broken = new ReadOnlyDevice('tablet9');
      const { activator } = createActivator({ devices: [broken, device] });

      expect(await activator.activate(a)).toBe(a);

      expect(profile.pointer()).toBe(a);
      expect(device.writes).toHaveLength(9);
      expect(device.ledValues()).toEqual([2]);
      expect(logger.warnings).toHaveLength(9);
      expect(logger.warnings[0]).toBe('Failed to write status led on tablet9: Error: EACCES: permission denied');
      expect(logger.warnings[1]).toBe('Failed to write button 0 image on tablet9: Error: EACCES: permission denied');
    });

    it('should keep writing the remaining slots after a refused one', async () => {
      const a = profile.state('a');
      profile.file('blank.raw', 'blank');
      const writes: number[] = [];
      const partial = new ReadOnlyDevice('tablet2', [3], false);
      const { activator } = createActivator({
        devices: [
          {
            id: partial.id,
            setStatusLed: () => partial.setStatusLed(),
            setButtonImage: (slot: number) => {
              partial.setButtonImage(slot);
              writes.push(slot);
            },
          },
        ],
      });

      await activator.activate(a);

      expect(writes).toEqual([0, 1, 2, 4, 5, 6, 7]);
      expect(logger.warnings).toEqual([
        'Failed to write button 3 image on tablet2: Error: EACCES: permission denied',
      ]);
    });

    it('should warn about a bad _status once per activation', async () => {
      const a = profile.state('a');
      profile.file('a/_status', 'x');
      profile.file('blank.raw', 'blank');
      const { activator } = createActivator();

      await activator.activate(a);

      expect(logger.warnings).toEqual([
        `Ignoring ${path.join(a, '_status')}: expected a number between 1 and 3`,
      ]);
      expect(device.ledValues()).toEqual([STATUS_LED_OFF]);
    });

    it('should rerun _init when the current state is activated again', async () => {
      const a = profile.state('a');
      const hook = profile.executable('a/_init');
      const { activator, runner } = createActivator({ devices: [] });

      await activator.activate(a);
      await activator.activate(a);

      expect(runner.commands()).toEqual([hook, hook]);
    });
  });
});
