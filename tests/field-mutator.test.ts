import { describe, it, expect } from 'vitest';
import type { ProjectField } from '../src/types/github.js';
import { buildEngine, fakeBoard, recordingTransport } from './helpers/fake-github.js';

const SAMPLE_FIELDS: ProjectField[] = [
  { id: 'F_text', name: 'Notes', dataType: 'TEXT' },
  { id: 'F_number', name: 'Estimate', dataType: 'NUMBER' },
  { id: 'F_date', name: 'Due', dataType: 'DATE' },
  {
    id: 'F_select',
    name: 'Status',
    dataType: 'SINGLE_SELECT',
    options: [{ id: 'OPT_done', name: 'Done' }],
  },
  {
    id: 'F_iter',
    name: 'Sprint',
    dataType: 'ITERATION',
    activeIterations: [{ id: 'IT_3', title: 'Sprint 3', startDate: '2024-03-01', duration: 14 }],
    completedIterations: [],
  },
];

const SAMPLE_INPUT: Record<string, string> = {
  TEXT: 'hello',
  NUMBER: '3',
  DATE: '2024-05-01',
  SINGLE_SELECT: 'Done',
  ITERATION: 'Sprint 3',
};

describe('FieldMutator.setField', () => {
  it('should send exactly one value shape per field type', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    for (const field of SAMPLE_FIELDS) {
      const result = await mutator.setField('PVT_1', 'I_1', field, SAMPLE_INPUT[field.dataType]);
      expect(result.ok).toBe(true);
    }

    expect(board.mutations().map((m) => m.variables.value)).toEqual([
      { text: 'hello' },
      { number: 3 },
      { date: '2024-05-01' },
      { singleSelectOptionId: 'OPT_done' },
      { iterationId: 'IT_3' },
    ]);
  });

  it('should refuse an unsupported field type without a remote call', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.setField(
      'PVT_1',
      'I_1',
      { id: 'F_lbl', name: 'Labels', dataType: 'UNSUPPORTED', remoteDataType: 'LABELS' },
      'bug',
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UnsupportedFieldTypeError');
      expect(result.error.message).toBe('Unsupported field type: LABELS (field "Labels")');
    }
    expect(board.calls).toHaveLength(0);
  });

  it.each([
    ['Estimate', 'abc'],
    ['Estimate', '5.'],
    ['Estimate', ''],
    ['Due', '2024/05/01'],
    ['Due', '24-05-01'],
  ])('should reject %s = %j before any call', async (name, raw) => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);
    const field = SAMPLE_FIELDS.find((f) => f.name === name);
    if (!field) throw new Error(`missing sample field ${name}`);

    const result = await mutator.setField('PVT_1', 'I_1', field, raw);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('ValidationError');
    expect(board.calls).toHaveLength(0);
  });

  it('should report the rejected number in the error', async () => {
    const { mutator } = buildEngine(fakeBoard().transport);

    const result = await mutator.setField('PVT_1', 'I_1', SAMPLE_FIELDS[1], 'abc');

    expect(!result.ok && result.error.message).toBe('Invalid number format: abc');
  });

  it('should accept negative and decimal numbers', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    await mutator.setField('PVT_1', 'I_1', SAMPLE_FIELDS[1], '5.5');
    await mutator.setField('PVT_1', 'I_1', SAMPLE_FIELDS[1], '-2');

    expect(board.mutations().map((m) => m.variables.value)).toEqual([{ number: 5.5 }, { number: -2 }]);
  });

  it('should set a single-select field by option name in one mutation', async () => {
    const board = fakeBoard();
    const { resolver, mutator } = buildEngine(board.transport);

    const project = await resolver.resolveProject('acme', 1);
    if (!project.ok) throw project.error;
    const status = await resolver.resolveField(project.value, 'Status');
    if (!status.ok) throw status.error;
    const result = await mutator.setField(project.value, 'I_1', status.value, 'Done');

    expect(result).toEqual({ ok: true, value: undefined });
    expect(board.mutations()).toHaveLength(1);
    expect(board.mutations()[0].variables).toEqual({
      projectId: 'PVT_1',
      itemId: 'I_1',
      fieldId: 'PVTSSF_status',
      value: { singleSelectOptionId: 'OPT_done' },
    });
  });

  it('should report an item the remote cannot resolve as NotFoundError', async () => {
    const board = fakeBoard({ rejectItems: ['I_gone'] });
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.setField('PVT_1', 'I_gone', SAMPLE_FIELDS[0], 'x');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('NotFoundError');
      expect(result.error.message).toBe("Could not resolve to a node with the global id of 'I_gone'");
    }
    expect(board.calls).toHaveLength(1);
  });

  it('should keep other remote errors verbatim as RemoteLogicalError', async () => {
    const fake = recordingTransport(() => ({
      data: { updateProjectV2ItemFieldValue: null },
      errors: [{ message: 'Resource not accessible by integration' }],
    }));
    const { mutator } = buildEngine(fake.transport);

    const result = await mutator.setField('PVT_1', 'I_1', SAMPLE_FIELDS[0], 'x');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('RemoteLogicalError');
      expect(result.error.message).toBe('Resource not accessible by integration');
    }
    expect(fake.calls).toHaveLength(1);
  });

  it('should fail when the response carries no item id', async () => {
    const fake = recordingTransport(() => ({ data: { updateProjectV2ItemFieldValue: { projectV2Item: null } } }));
    const { mutator } = buildEngine(fake.transport);

    const result = await mutator.setField('PVT_1', 'I_1', SAMPLE_FIELDS[0], 'x');

    expect(!result.ok && result.error.message).toBe('Failed to update field (no item ID returned)');
  });
});

describe('FieldMutator.setFieldById', () => {
  it('should write the option id without resolving names', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.setFieldById('PVT_1', 'I_1', 'PVTSSF_status', 'OPT_todo');

    expect(result.ok).toBe(true);
    expect(board.calls).toHaveLength(1);
    expect(board.calls[0].variables.value).toEqual({ singleSelectOptionId: 'OPT_todo' });
  });

  it('should require both ids', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.setFieldById('PVT_1', 'I_1', 'PVTSSF_status', '');

    expect(!result.ok && result.error.kind).toBe('ValidationError');
    expect(board.calls).toHaveLength(0);
  });
});

describe('FieldMutator.clearField', () => {
  it('should send the clear mutation without a value', async () => {
    const board = fakeBoard();
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.clearField('PVT_1', 'I_1', { id: 'PVTF_due', name: 'Due' });

    expect(result.ok).toBe(true);
    expect(board.calls[0].query).toContain('clearProjectV2ItemFieldValue');
    expect(board.calls[0].variables).toEqual({ projectId: 'PVT_1', itemId: 'I_1', fieldId: 'PVTF_due' });
  });

  it('should report an unknown item on clear as NotFoundError', async () => {
    const board = fakeBoard({ rejectItems: ['I_gone'] });
    const { mutator } = buildEngine(board.transport);

    const result = await mutator.clearField('PVT_1', 'I_gone', { id: 'PVTF_due', name: 'Due' });

    expect(!result.ok && result.error.kind).toBe('NotFoundError');
  });

  it('should fail when the clear response carries no item id', async () => {
    const fake = recordingTransport(() => ({ data: { clearProjectV2ItemFieldValue: null } }));
    const { mutator } = buildEngine(fake.transport);

    const result = await mutator.clearField('PVT_1', 'I_1', { id: 'PVTF_due', name: 'Due' });

    expect(!result.ok && result.error.message).toBe('Failed to clear field (no item ID returned)');
  });
});
