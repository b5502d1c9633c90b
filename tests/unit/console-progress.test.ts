import { EventEmitter } from 'events';

import { ConsoleProgress } from '@cli/ConsoleProgress';

import { ScanStage } from '../../src/types/enums';
import { MemoryStream } from '../helpers/fakes';

describe('ConsoleProgress', () => {
  let stream: MemoryStream;
  let source: EventEmitter;

  beforeEach(() => {
    stream = new MemoryStream();
    source = new EventEmitter();
  });

  it('should draw stage results on the given stream', () => {
    const progress = new ConsoleProgress(stream, true);
    progress.attach(source);

    source.emit('stage:start', ScanStage.OPEN_TARGET);
    source.emit('stage:complete', ScanStage.OPEN_TARGET);
    source.emit('stage:start', ScanStage.ACTIVE_SCAN);
    source.emit('stage:failed', ScanStage.ACTIVE_SCAN, new Error('scan aborted'));
    progress.stop();

    expect(stream.text).toContain(' Opening target\n');
    expect(stream.text).toContain(' Running active scan\n');
  });

  it('should write nothing when disabled', () => {
    const progress = new ConsoleProgress(stream, false);
    progress.attach(source);

    source.emit('stage:start', ScanStage.OPEN_TARGET);
    source.emit('stage:complete', ScanStage.OPEN_TARGET);
    progress.stop();

    expect(stream.text).toBe('');
  });
});
