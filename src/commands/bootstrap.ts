import { DialogueEntity } from '../entity/DialogueEntity';
import { TemplateStore } from '../dialogue/TemplateStore';
import { GraphMemoryService } from '../graph/GraphMemoryService';
import { dbg } from '../utils';

export interface EntityOptions {
    graphFile?: string;
    templatesConfig?: string;
}

/**
 * Builds an entity for one CLI run: templates (optionally overridden), the
 * startup self-check, and graph counters loaded from the graph file if given.
 * @throws ConfigurationError when the self-check fails.
 */
export async function createEntity(options: EntityOptions, graph: GraphMemoryService = GraphMemoryService.fromState(null)): Promise<DialogueEntity> {
    const templates = new TemplateStore(options.templatesConfig);
    const entity = new DialogueEntity(templates);

    if (options.graphFile) {
        await graph.loadGraph(options.graphFile);
    }
    graph.syncEngineState(entity.state);
    dbg(`Entity ${entity.id}: ${entity.state.graphNodes} graph nodes, ${entity.state.graphEdges} edges.`);
    return entity;
}
