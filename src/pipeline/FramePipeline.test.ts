import { describe, expect, it } from 'vitest';

import { blankFrame, buildChannelMeanModel, fakeEngine, RED, serializeModel, trackedHandle, uniformFrame } from '../testing/fixtures';
import type { PackedImage } from '../types';
import type { PipelineError } from '../utils/errors';
import { ConfigurationError, FrameFormatError, PipelineBusyError, PipelineClosedError, ShapeMismatchError } from '../utils/errors';
import { loadInferenceEngine } from '../utils/loadModel';
import { FramePipeline } from './FramePipeline';
import { PredictionChannel } from './predictionChannel';

describe('FramePipeline', () => {
  it('publishes the prediction for a frame and closes it once', async () => {
    const channel = new PredictionChannel();
    const pipeline = FramePipeline.create(fakeEngine([0.1, 0.7, 0.2]), {
      sink: channel,
      labels: ['fist', 'palm', 'peace'],
    });
    const handle = trackedHandle({ ...uniformFrame(8, 6, RED), timestampMs: 1000 });

    const outcome = await pipeline.process(handle);

    expect(outcome.ok).toBe(true);
    expect(channel.getLatest()).toMatchObject({ labelIndex: 1, label: 'palm', timestampMs: 1000 });
    expect(handle.closeCount()).toBe(1);
    expect(pipeline.getState()).toBe('idle');
  });

  it('keeps going when the camera delivers a frame without pixels', async () => {
    const channel = new PredictionChannel();
    const model = buildChannelMeanModel(4, 4);
    const engine = await loadInferenceEngine(await serializeModel(model));
    model.dispose();
    const pipeline = FramePipeline.create(engine, { sink: channel });
    const handle = trackedHandle(blankFrame(640, 480));

    const outcome = await pipeline.process(handle);

    // the black placeholder scores 0 everywhere, so the first label wins the tie
    expect(outcome).toMatchObject({ ok: true, degraded: 'capture_unavailable' });
    expect(channel.getLatest()).toMatchObject({ labelIndex: 0, rawScores: [0, 0, 0] });
    expect(handle.closeCount()).toBe(1);
    await pipeline.close();
  });

  it('rejects a frame while another one is in flight', async () => {
    const pipeline = FramePipeline.create(fakeEngine(), { sink: new PredictionChannel() });
    const first = trackedHandle(uniformFrame(4, 4, RED));
    const second = trackedHandle(uniformFrame(4, 4, RED));

    const running = pipeline.process(first);
    expect(pipeline.getState()).toBe('processing');
    const rejected = await pipeline.process(second);

    expect(rejected.ok).toBe(false);
    expect(!rejected.ok && rejected.error).toBeInstanceOf(PipelineBusyError);
    expect(second.closeCount()).toBe(1);
    expect((await running).ok).toBe(true);
    expect(first.closeCount()).toBe(1);
  });

  it('turns a malformed frame into "no prediction" and reports it as transient', async () => {
    const channel = new PredictionChannel();
    const errors: PipelineError[] = [];
    const pipeline = FramePipeline.create(fakeEngine(), { sink: channel, onError: (error) => errors.push(error) });
    const frame = uniformFrame(4, 4, RED);
    const handle = trackedHandle({
      ...frame,
      planes: frame.planes && [{ bytes: new Uint8Array(3), rowStride: 4, pixelStride: 1 }, frame.planes[1], frame.planes[2]],
    });

    const outcome = await pipeline.process(handle);

    expect(outcome.ok).toBe(false);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(FrameFormatError);
    expect(errors[0].severity).toBe('transient');
    expect(channel.getLatest()).toEqual({ labelIndex: -1, rawScores: [], confidence: null, label: null });
    expect(handle.closeCount()).toBe(1);
  });

  it('escalates repeated shape mismatches to a configuration error', async () => {
    const events: string[] = [];
    const errors: PipelineError[] = [];
    const tooSmall = (): PackedImage => ({ width: 2, height: 2, data: new Uint8Array(12) });
    const pipeline = FramePipeline.create(fakeEngine(undefined, events), {
      sink: new PredictionChannel(),
      stages: { resize: tooSmall },
      structuralMismatchThreshold: 3,
      onError: (error) => errors.push(error),
    });

    for (let i = 0; i < 3; i++) {
      await pipeline.process(trackedHandle(uniformFrame(4, 4, RED)));
    }

    expect(events).not.toContain('run');
    expect(errors.map((error) => error.severity)).toEqual(['transient', 'transient', 'structural']);
    expect(errors[0]).toBeInstanceOf(ShapeMismatchError);
    expect(errors[2]).toBeInstanceOf(ConfigurationError);
  });

  it('refuses a model that does not take RGB input', () => {
    expect(() =>
      FramePipeline.create(fakeEngine(undefined, [], [1, 4, 4, 1]), { sink: new PredictionChannel() })
    ).toThrow(ConfigurationError);
  });

  it('waits for the frame in flight before releasing the engine', async () => {
    const events: string[] = [];
    const pipeline = FramePipeline.create(fakeEngine(undefined, events), { sink: new PredictionChannel() });
    const handle = trackedHandle(uniformFrame(4, 4, RED), () => events.push('frame closed'));

    const running = pipeline.process(handle);
    const closing = pipeline.close();
    expect(pipeline.getState()).toBe('processing');

    await closing;

    expect(events).toEqual(['run', 'frame closed', 'dispose']);
    expect((await running).ok).toBe(true);
    expect(pipeline.getState()).toBe('closed');
  });

  it('disposes the engine once and turns frames away after close', async () => {
    const events: string[] = [];
    const pipeline = FramePipeline.create(fakeEngine(undefined, events), { sink: new PredictionChannel() });

    await Promise.all([pipeline.close(), pipeline.close()]);
    const handle = trackedHandle(uniformFrame(4, 4, RED));
    const outcome = await pipeline.process(handle);

    expect(events).toEqual(['dispose']);
    expect(!outcome.ok && outcome.error).toBeInstanceOf(PipelineClosedError);
    expect(handle.closeCount()).toBe(1);
  });

  it('still releases the engine on close when the sink throws', async () => {
    const events: string[] = [];
    const pipeline = FramePipeline.create(fakeEngine(undefined, events), {
      sink: {
        publish: () => {
          throw new Error('listener blew up');
        },
      },
    });
    const handle = trackedHandle(uniformFrame(4, 4, RED));

    const running = pipeline.process(handle);
    await pipeline.close();

    expect((await running).ok).toBe(true);
    expect(events).toEqual(['run', 'dispose']);
    expect(handle.closeCount()).toBe(1);
    expect(pipeline.getState()).toBe('closed');
  });

  it('reports the outcome when the error listener throws', async () => {
    const channel = new PredictionChannel();
    const pipeline = FramePipeline.create(fakeEngine(), {
      sink: channel,
      onError: () => {
        throw new Error('listener blew up');
      },
    });

    const outcome = await pipeline.process(trackedHandle({ width: 0, height: 4, planes: uniformFrame(4, 4, RED).planes }));

    expect(!outcome.ok && outcome.error).toBeInstanceOf(FrameFormatError);
    expect(channel.getLatest()).toMatchObject({ labelIndex: -1 });
    expect(pipeline.getState()).toBe('idle');
  });

  it('returns to idle when closing the frame handle throws', async () => {
    const events: string[] = [];
    const pipeline = FramePipeline.create(fakeEngine(undefined, events), { sink: new PredictionChannel() });
    const broken = trackedHandle(uniformFrame(4, 4, RED), () => {
      throw new Error('already recycled');
    });

    const outcome = await pipeline.process(broken);

    expect(outcome.ok).toBe(true);
    expect(broken.closeCount()).toBe(1);
    expect(pipeline.getState()).toBe('idle');

    const next = trackedHandle(uniformFrame(4, 4, RED));
    expect((await pipeline.process(next)).ok).toBe(true);
    expect(next.closeCount()).toBe(1);

    await pipeline.close();
    expect(events).toEqual(['run', 'run', 'dispose']);
    expect(pipeline.getState()).toBe('closed');
  });
});
