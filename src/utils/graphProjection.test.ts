import { describe, expect, it } from 'vitest';
import { NodeLabels, RelationshipTypes } from '../constants/graph.js';
import type { ExtractedFacts } from '../types/extraction.js';
import { entryNodeKey, ownerNodeKey, projectFacts } from './graphProjection.js';

const facts: ExtractedFacts = {
  entities: [
    { name: 'Sarah', type: 'person' },
    { name: 'Acme Corp', type: 'organization' },
    { name: 'sarah', type: 'person' },
  ],
  emotions: [{ name: 'Anxiety', valence: 'negative', intensity: 4 }],
  relationships: [
    { source: 'I', target: 'Sarah', relation: 'Works With' },
    { source: 'Sarah', target: 'Acme Corp', relation: 'works at' },
    { source: 'Bob', target: 'Sarah', relation: 'knows' },
  ],
  intent: 'self-reflection',
  selfAwareness: 0.2,
  strategy: 'generative',
};

describe('projectFacts', () => {
  it('builds owner, entry, entity and emotion nodes with merged duplicates', () => {
    const projection = projectFacts('user-1', 'entry-1', facts, { summary: 'Work week' });

    expect(projection.nodes.map((node) => [node.label, node.name])).toEqual([
      [NodeLabels.Person, 'me'],
      [NodeLabels.Entry, 'entry-1'],
      [NodeLabels.Person, 'Sarah'],
      [NodeLabels.Entity, 'Acme Corp'],
      [NodeLabels.Emotion, 'anxiety'],
    ]);
    expect(projection.nodes.every((node) => node.user_id === 'user-1')).toBe(true);
    expect(projection.nodes[1].properties).toEqual({ entry_id: 'entry-1', summary: 'Work week' });
  });

  it('resolves self references to the owner and skips unknown endpoints', () => {
    const projection = projectFacts('user-1', 'entry-1', facts);
    const relatesTo = projection.edges.filter((edge) => edge.type === RelationshipTypes.RelatesTo);

    expect(relatesTo.map((edge) => edge.relation)).toEqual(['works with', 'works at']);
    expect(relatesTo[0].from_key).toBe(ownerNodeKey('user-1'));
    expect(projection.edges.map((edge) => edge.type)).toEqual([
      RelationshipTypes.Authored,
      RelationshipTypes.Mentions,
      RelationshipTypes.Mentions,
      RelationshipTypes.Feels,
      RelationshipTypes.RelatesTo,
      RelationshipTypes.RelatesTo,
    ]);
  });

  it('records valence and intensity on the FEELS edge', () => {
    const projection = projectFacts('user-1', 'entry-1', facts);
    const feels = projection.edges.find((edge) => edge.type === RelationshipTypes.Feels);

    expect(feels?.from_key).toBe(entryNodeKey('entry-1'));
    expect(feels?.properties).toEqual({ valence: 'negative', intensity: 4 });
  });

  it('is deterministic for the same input', () => {
    expect(projectFacts('user-1', 'entry-1', facts)).toEqual(projectFacts('user-1', 'entry-1', facts));
  });

  it('keys entity nodes per owner', () => {
    const mine = projectFacts('user-1', 'entry-1', facts);
    const theirs = projectFacts('user-2', 'entry-2', facts);

    expect(mine.nodes[2].key).not.toBe(theirs.nodes[2].key);
  });
});
