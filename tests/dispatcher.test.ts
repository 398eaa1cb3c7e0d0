import { expect } from 'chai';
import { describe, it, beforeEach } from 'mocha';
import { dispatch, EPISTEMIC_NOTES } from '../src/dialogue/dispatcher';
import { TemplateStore } from '../src/dialogue/TemplateStore';
import { createEngineState } from '../src/core/EngineState';
import { EngineState } from '../src/core/engine_types';

describe('dispatch', () => {
    const templates = new TemplateStore();
    let state: EngineState;

    beforeEach(() => {
        state = createEngineState();
    });

    it('should answer a Russian consciousness question', () => {
        const result = dispatch({ text: 'Ты сознателен?', languageHint: 'auto' }, state, templates);

        expect(result.language).to.equal('ru');
        expect(result.responseType).to.equal('consciousness');
        expect(result.maintainsHonesty).to.equal(true);
        expect(result.response).to.equal(templates.getTemplate('consciousness', 'ru'));
        expect(result.epistemicNote).to.equal(EPISTEMIC_NOTES.ru);
    });

    it('should answer an English consciousness question', () => {
        const result = dispatch({ text: 'Are you conscious?', languageHint: 'auto' }, state, templates);

        expect(result.language).to.equal('en');
        expect(result.responseType).to.equal('consciousness');
        expect(result.mode).to.equal('simple_dialogue');
    });

    it('should recognise gratitude', () => {
        expect(dispatch({ text: 'Спасибо!', languageHint: 'auto' }, state, templates).responseType).to.equal('gratitude');
    });

    it('should echo unmatched input inside the fallback reply', () => {
        const result = dispatch({ text: 'xyz123', languageHint: 'auto' }, state, templates);

        expect(result.responseType).to.equal('fallback');
        expect(result.response).to.contain('xyz123');
        expect(result.userInput).to.equal('xyz123');
    });

    it('should report graph counters in the fallback reply', () => {
        state.graphNodes = 5;
        state.graphEdges = 7;
        const result = dispatch({ text: 'xyz123', languageHint: 'en' }, state, templates);
        expect(result.response).to.contain('5 nodes, 7 edges tracked');
    });

    it('should let an explicit hint override the script of the text', () => {
        const result = dispatch({ text: 'Are you conscious?', languageHint: 'ru' }, state, templates);

        expect(result.language).to.equal('ru');
        // Russian rules do not know the English keyword
        expect(result.responseType).to.equal('fallback');
        expect(result.response).to.contain('«Are you conscious?»');
    });

    it('should increment the cycle exactly once per call and return the new value', () => {
        const first = dispatch({ text: 'Are you conscious?', languageHint: 'auto' }, state, templates);
        const second = dispatch({ text: 'xyz123', languageHint: 'auto' }, state, templates);
        const third = dispatch({ text: '', languageHint: 'auto' }, state, templates);

        expect([first.cycle, second.cycle, third.cycle]).to.deep.equal([1, 2, 3]);
        expect(state.cycle).to.equal(3);
    });

    it('should not touch anything but the cycle', () => {
        state.graphNodes = 2;
        dispatch({ text: 'help', languageHint: 'auto' }, state, templates);
        expect(state).to.deep.equal({ cycle: 1, graphNodes: 2, graphEdges: 0, selfNotSelfCapable: true, ethicsEnabled: true });
    });

    it('should handle empty text', () => {
        const result = dispatch({ text: '', languageHint: 'auto' }, state, templates);

        expect(result.language).to.equal('en');
        expect(result.responseType).to.equal('fallback');
        expect(result.response).to.contain('""');
    });

    it('should return a frozen response', () => {
        const result = dispatch({ text: 'lol', languageHint: 'auto' }, state, templates);
        expect(Object.isFrozen(result)).to.be.true;
        expect(Object.isFrozen(result.request)).to.be.true;
    });
});
