/**
 * SAX walking for SpreadsheetML parts.
 *
 * Parts are matched on local names so both default-namespace documents
 * (`<c r="A1">`) and prefixed ones (`<x:c r="A1">`) are understood.
 */

import sax from 'sax';
import { MalformedXmlError } from '../errors';

export interface XmlElement {
  /** Element name without namespace prefix */
  local: string;
  /** Attribute values keyed by local name */
  attributes: Record<string, string>;
}

export interface XmlHandlers {
  open?: (element: XmlElement) => void;
  close?: (local: string) => void;
  text?: (text: string) => void;
}

function localName(qualified: string): string {
  const colon = qualified.indexOf(':');
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

function toElement(tag: sax.Tag | sax.QualifiedTag): XmlElement {
  const attributes: Record<string, string> = {};

  if ('local' in tag) {
    for (const attribute of Object.values(tag.attributes)) {
      // Namespace declarations are not data
      if (attribute.name === 'xmlns' || attribute.prefix === 'xmlns') continue;
      attributes[attribute.local || attribute.name] = attribute.value;
    }
    return { local: tag.local || tag.name, attributes };
  }

  for (const [name, value] of Object.entries(tag.attributes)) {
    if (name === 'xmlns' || name.startsWith('xmlns:')) continue;
    attributes[localName(name)] = value;
  }
  return { local: localName(tag.name), attributes };
}

/**
 * Stream `xml` through the handlers in document order.
 * Errors thrown by a handler propagate to the caller unchanged.
 */
export function walkXml(xml: string, part: string, handlers: XmlHandlers): void {
  const parser = sax.parser(true, {
    xmlns: true,
    trim: false,
    normalize: false,
  });

  parser.onerror = (error) => {
    throw new MalformedXmlError(`Malformed XML in ${part}: ${error.message.split('\n')[0]}`, {
      part,
      cause: error,
    });
  };

  parser.onopentag = (tag) => handlers.open?.(toElement(tag));
  parser.onclosetag = (name) => handlers.close?.(localName(name));
  if (handlers.text) {
    const onText = handlers.text;
    parser.ontext = onText;
    parser.oncdata = onText;
  }

  parser.write(xml).close();
}
