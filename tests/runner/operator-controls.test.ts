import { OperatorControls } from '../../src/runner/operator-controls.js';
import { ValidationError } from '../../src/shared/errors.js';

describe('OperatorControls', () => {
  it('starts playing, not stopped, with the default delay range', () => {
    const controls = new OperatorControls();

    expect(controls.getPlayPauseState()).toBe('play');
    expect(controls.isStopRequested()).toBe(false);
    expect(controls.getDelayRange()).toEqual({ minSeconds: 20, maxSeconds: 37 });
  });

  it('toggles between play and pause and announces each change', () => {
    const controls = new OperatorControls();
    const changes: string[] = [];
    controls.on('control:play-pause', (state) => changes.push(state));

    expect(controls.togglePlayPause()).toBe('pause');
    controls.pause();
    expect(controls.togglePlayPause()).toBe('play');

    expect(changes).toEqual(['pause', 'play']);
  });

  it('latches stop', () => {
    const controls = new OperatorControls();
    const stop = vi.fn();
    controls.on('control:stop', stop);

    controls.stop();
    controls.stop();
    controls.play();

    expect(controls.isStopRequested()).toBe(true);
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it('validates delay ranges', () => {
    const controls = new OperatorControls({ minSeconds: 1, maxSeconds: 2 });

    expect(controls.setDelayRange(5, 5)).toEqual({ minSeconds: 5, maxSeconds: 5 });
    expect(() => controls.setDelayRange(6, 5)).toThrow(ValidationError);
    expect(() => controls.setDelayRange(-1, 5)).toThrow(ValidationError);
    expect(() => new OperatorControls({ minSeconds: 3, maxSeconds: 2 })).toThrow(ValidationError);
    expect(controls.getDelayRange()).toEqual({ minSeconds: 5, maxSeconds: 5 });
  });

  it('records the last progress pushed by the worker', () => {
    const controls = new OperatorControls();

    controls.onProgress(12, 6);
    controls.onProcessedCountUpdate(6);

    expect(controls.progress).toEqual({ total: 12, completed: 6 });
    expect(controls.processed).toBe(6);
  });
});
