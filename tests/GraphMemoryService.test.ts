import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import { GraphMemoryService } from '../src/graph/GraphMemoryService';
import { DEFAULT_GRAPH_STATE, Entity } from '../src/graph/graph_types';
import { createEngineState } from '../src/core/EngineState';

function entity(name: string, tags: string[] = []): Entity {
    return { name, description: `${name} node`, type: 'concept', tags };
}

describe('GraphMemoryService', () => {
    let graphService: GraphMemoryService;
    const mockFilePath = 'test-graph.json';
    let readFileMock: sinon.SinonStub;
    let consoleLogStub: sinon.SinonStub;
    let consoleWarnStub: sinon.SinonStub;

    beforeEach(() => {
        readFileMock = sinon.stub().resolves(JSON.stringify(DEFAULT_GRAPH_STATE));
        graphService = GraphMemoryService.fromState(undefined, readFileMock);
        consoleLogStub = sinon.stub(console, 'log');
        consoleWarnStub = sinon.stub(console, 'warn');
        sinon.stub(console, 'error');
    });

    afterEach(() => {
        sinon.restore();
    });

    describe('loadGraph', () => {
        it('should initialize with an empty graph when the file does not exist', async () => {
            readFileMock.rejects({ code: 'ENOENT' });

            await graphService.loadGraph(mockFilePath);

            expect(graphService.getCurrentState()).to.deep.equal(DEFAULT_GRAPH_STATE);
        });

        it('should report a missing file on stderr, keeping stdout clean', async () => {
            readFileMock.rejects({ code: 'ENOENT' });

            await graphService.loadGraph(mockFilePath);

            expect(consoleLogStub.called).to.be.false;
            expect(consoleWarnStub.calledOnce).to.be.true;
            expect(consoleWarnStub.firstCall.args[0]).to.match(/^Graph file not found at .*test-graph\.json, starting with an empty graph\.$/);
        });

        it('should load a valid graph and fill in defaults', async () => {
            readFileMock.resolves(JSON.stringify({
                entities: [{ name: 'witness' }, { name: 'observer', tags: ['witness'] }],
                relationships: [{ from: 'witness', to: 'observer', type: 'supports' }],
            }));

            await graphService.loadGraph(mockFilePath);

            expect(graphService.nodeCount()).to.equal(2);
            expect(graphService.edgeCount()).to.equal(1);
            expect(graphService.getCurrentState().entities[0]).to.deep.equal({
                name: 'witness', description: '', type: 'concept', tags: [],
            });
        });

        it('should throw for corrupted JSON', async () => {
            readFileMock.resolves('invalid json');

            let error: unknown;
            try {
                await graphService.loadGraph(mockFilePath);
            } catch (e) {
                error = e;
            }
            expect(error).to.be.instanceOf(SyntaxError);
        });

        it('should throw for a graph that does not match the schema', async () => {
            readFileMock.resolves(JSON.stringify({ entities: [{ description: 'nameless' }] }));

            let error: unknown;
            try {
                await graphService.loadGraph(mockFilePath);
            } catch (e) {
                error = e;
            }
            expect(error).to.exist;
        });

        it('should re-throw other I/O errors', async () => {
            readFileMock.rejects(new Error('Permission denied'));

            let error: unknown;
            try {
                await graphService.loadGraph(mockFilePath);
            } catch (e) {
                error = e;
            }
            expect(error).to.be.instanceOf(Error).and.have.property('message').that.includes('Permission denied');
        });
    });

    describe('addOrUpdateEntity', () => {
        it('should add a new entity', () => {
            expect(graphService.addOrUpdateEntity(entity('a'))).to.be.true;
            expect(graphService.nodeCount()).to.equal(1);
        });

        it('should update an existing entity and merge tags without duplicates', () => {
            graphService.addOrUpdateEntity(entity('a', ['tag1', 'tag2']));

            const result = graphService.addOrUpdateEntity({ name: 'a', description: 'updated', type: 'intent', tags: ['tag2', 'tag3'] });

            expect(result).to.be.false;
            expect(graphService.nodeCount()).to.equal(1);
            expect(graphService.getCurrentState().entities[0]).to.deep.equal({
                name: 'a', description: 'updated', type: 'intent', tags: ['tag1', 'tag2', 'tag3'],
            });
        });
    });

    describe('addOrUpdateRelationship', () => {
        beforeEach(() => {
            graphService.addOrUpdateEntity(entity('a'));
            graphService.addOrUpdateEntity(entity('b'));
        });

        it('should add a relationship between existing entities', () => {
            expect(graphService.addOrUpdateRelationship({ from: 'a', to: 'b', type: 'supports' })).to.be.true;
            expect(graphService.edgeCount()).to.equal(1);
        });

        it('should not duplicate an identical relationship', () => {
            graphService.addOrUpdateRelationship({ from: 'a', to: 'b', type: 'supports' });
            expect(graphService.addOrUpdateRelationship({ from: 'a', to: 'b', type: 'supports' })).to.be.true;
            expect(graphService.edgeCount()).to.equal(1);
        });

        it('should reject relationships with an unknown endpoint', () => {
            expect(graphService.addOrUpdateRelationship({ from: 'a', to: 'missing', type: 'supports' })).to.be.false;
            expect(graphService.edgeCount()).to.equal(0);
        });
    });

    describe('removeEntity', () => {
        it('should remove an entity and every relationship touching it', () => {
            graphService.addOrUpdateEntity(entity('a'));
            graphService.addOrUpdateEntity(entity('b'));
            graphService.addOrUpdateEntity(entity('c'));
            graphService.addOrUpdateRelationship({ from: 'a', to: 'b', type: 'supports' });
            graphService.addOrUpdateRelationship({ from: 'c', to: 'a', type: 'bridges' });
            graphService.addOrUpdateRelationship({ from: 'b', to: 'c', type: 'bridges' });

            expect(graphService.removeEntity('a')).to.be.true;

            expect(graphService.nodeCount()).to.equal(2);
            expect(graphService.getCurrentState().relationships).to.deep.equal([{ from: 'b', to: 'c', type: 'bridges' }]);
        });

        it('should return false for an unknown entity', () => {
            expect(graphService.removeEntity('nobody')).to.be.false;
        });
    });

    describe('syncEngineState', () => {
        it('should copy the counters into the engine state and leave the rest alone', () => {
            const state = createEngineState({ cycle: 5 });
            graphService.addOrUpdateEntity(entity('a'));
            graphService.addOrUpdateEntity(entity('b'));
            graphService.addOrUpdateRelationship({ from: 'a', to: 'b', type: 'supports' });

            graphService.syncEngineState(state);

            expect(state).to.deep.equal({ cycle: 5, graphNodes: 2, graphEdges: 1, selfNotSelfCapable: true, ethicsEnabled: true });
        });

        it('should let counters go down after pruning', () => {
            const state = createEngineState();
            graphService.addOrUpdateEntity(entity('a'));
            graphService.syncEngineState(state);
            graphService.removeEntity('a');
            graphService.syncEngineState(state);

            expect(state.graphNodes).to.equal(0);
        });
    });
});
