/**
 * Decides what a decoded block is from the field that tags it.
 * @module protocol/classifier
 */
import {AmiFieldName} from './constants';
import {AmiFieldSet, type AmiRawBlock} from './fields';
import {AmiEvent, type AmiIncomingMessage, AmiResponse} from './message';

/**
 * Classifies one raw block. `Response` wins over `Event`; a block carrying
 * neither yields `null` and is the caller's to report and drop.
 */
export const classifyBlock = (block: AmiRawBlock): AmiIncomingMessage | null => {
    const fields = new AmiFieldSet(block);
    if (fields.has(AmiFieldName.Response)) return new AmiResponse(fields);
    if (fields.has(AmiFieldName.Event)) return new AmiEvent(fields);
    return null;
};
