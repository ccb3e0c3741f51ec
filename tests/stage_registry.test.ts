import test from 'node:test';
import assert from 'node:assert/strict';

import { getStage, registerStage, stages } from '../src';
import { StageRegistry } from '../src/stage_registry';
import { recordingStage } from './fakes';

test('registered creators are found by name', () => {
    const registry = new StageRegistry();
    const files = recordingStage('files');
    registry.register(recordingStage('disks'));
    registry.register(files);

    assert.equal(registry.get('files'), files);
    assert.equal(registry.get('network'), undefined);
    assert.deepEqual(registry.names(), ['disks', 'files']);
});

test('a name can only be registered once', () => {
    const registry = new StageRegistry();
    registry.register(recordingStage('disks'));

    assert.throws(() => registry.register(recordingStage('disks')), /already registered/);
});

test('the process-wide registry backs registerStage and getStage', () => {
    const creator = recordingStage('process-wide');

    registerStage(creator);

    assert.equal(getStage('process-wide'), creator);
    assert.ok(stages.names().includes('process-wide'));
});
