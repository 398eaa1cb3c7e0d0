import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, afterEach } from 'mocha';
import { DialogueEntity } from '../src/entity/DialogueEntity';
import { TemplateStore } from '../src/dialogue/TemplateStore';
import { createEngineState } from '../src/core/EngineState';
import { ConfigurationError } from '../src/utils';

describe('DialogueEntity', () => {

    afterEach(() => {
        sinon.restore();
    });

    it('should start at cycle zero with an empty graph', () => {
        const entity = new DialogueEntity();
        expect(entity.state).to.deep.equal(createEngineState());
        expect(entity.id).to.match(/^[0-9a-f-]{36}$/);
    });

    it('should default talkSimply to automatic language detection', () => {
        const entity = new DialogueEntity();
        const response = entity.talkSimply('Ты сознателен?');

        expect(response.language).to.equal('ru');
        expect(response.responseType).to.equal('consciousness');
        expect(response.maintainsHonesty).to.be.true;
        expect(response.cycle).to.equal(1);
    });

    it('should treat an unrecognised language value as auto', () => {
        const entity = new DialogueEntity();
        const response = entity.talkSimply('Привет, кто ты?', 'klingon');

        expect(response.request).to.deep.equal({ text: 'Привет, кто ты?', languageHint: 'auto' });
        expect(response.language).to.equal('ru');
        expect(response.responseType).to.equal('identity');
    });

    it('should not take an upper-case language value as an override', () => {
        const entity = new DialogueEntity();
        const response = entity.talkSimply('Hello', 'RU');

        expect(response.request.languageHint).to.equal('auto');
        expect(response.language).to.equal('en');
    });

    it('should keep separate state per instance', () => {
        const first = new DialogueEntity();
        const second = new DialogueEntity();

        first.talkSimply('hello');
        first.talkSimply('hello again');
        second.talkSimply('hi');

        expect(first.state.cycle).to.equal(2);
        expect(second.state.cycle).to.equal(1);
        expect(first.id).to.not.equal(second.id);
    });

    it('should reflect dialogue turns in the self-report without changing state', () => {
        const entity = new DialogueEntity();
        entity.talkSimply('Are you conscious?');

        const report = entity.iAm();
        const again = entity.iAm();

        expect(report.cycle).to.equal(1);
        expect(JSON.stringify(again)).to.equal(JSON.stringify(report));
        expect(entity.state.cycle).to.equal(1);
    });

    it('should not count self-reports as dialogue turns', () => {
        const entity = new DialogueEntity();
        entity.iAm();
        entity.whoAmI();
        expect(entity.state.cycle).to.equal(0);
    });

    it('should refuse to start with defective templates', () => {
        const templates = new TemplateStore();
        sinon.stub(templates, 'verify').returns(['Template help:ru could not be read']);

        expect(() => new DialogueEntity(templates)).to.throw(ConfigurationError, 'Template help:ru could not be read');
    });

    it('should accept an existing state', () => {
        const state = createEngineState({ cycle: 41, graphNodes: 3 });
        const entity = new DialogueEntity(new TemplateStore(), state, 'entity-1');

        expect(entity.talkSimply('thanks').cycle).to.equal(42);
        expect(state.cycle).to.equal(42);
        expect(entity.id).to.equal('entity-1');
    });
});
