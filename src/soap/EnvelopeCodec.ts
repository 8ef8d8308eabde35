/**
 * SOAP 1.1 Envelope Codec
 *
 * Purpose: wrap an opaque XML payload in a SOAP 1.1 envelope, and classify a
 * response envelope as a business body or a Fault.
 *
 * Key behaviors:
 * - The payload goes into soapenv:Body unmodified (only an XML declaration is
 *   dropped, since a prolog cannot appear inside another element)
 * - Fault lookup: SOAP 1.1 namespace-qualified first, then a bare <Fault>
 *   with no namespace for servers that do not qualify their faults
 * - A Fault wins over any business body; missing faultcode/faultstring are
 *   empty strings
 * - No Fault: the inner content of the Body is returned verbatim
 * - Not well-formed XML: EnvelopeParseError
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { EnvelopeParseError, FunctionalError, errorMessage } from '../model/DispatchErrors.js';
import type { ParsedResponse, SoapFault } from '../model/OperationResult.js';

export const SOAP_NAMESPACES = {
  SOAP_1_1_ENVELOPE: 'http://schemas.xmlsoap.org/soap/envelope/',
  XSI: 'http://www.w3.org/2001/XMLSchema-instance',
  XSD: 'http://www.w3.org/2001/XMLSchema',
};

const ENVELOPE_PREFIX = 'soapenv';

/**
 * A request envelope ready to be posted
 */
export interface SoapEnvelope {
  operationName: string;
  soapAction: string;
  xml: string;
}

/**
 * Parsed element with in-scope namespace resolution applied
 */
interface XmlElement {
  /** Qualified name as written, e.g. "soapenv:Body" */
  name: string;
  localName: string;
  namespace: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
  /** fast-xml-parser preserveOrder nodes of the children, for re-serialization */
  rawChildren: unknown[];
}

const ATTRIBUTE_PREFIX = '@_';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  suppressEmptyNode: true,
});

const XML_DECLARATION = /^\uFEFF?\s*<\?xml[^?]*\?>\s*/;

/**
 * Remove a leading byte-order mark and XML declaration
 */
export function stripXmlDeclaration(xml: string): string {
  return xml.replace(XML_DECLARATION, '').replace(/^\uFEFF/, '');
}

/**
 * Check well-formedness. Returns null when the document is well-formed,
 * otherwise a short description of the first problem.
 */
export function checkWellFormed(xml: string): string | null {
  const candidate = xml.replace(/^\uFEFF/, '').trimStart();
  if (candidate.length === 0) {
    return 'document is empty';
  }
  const result = XMLValidator.validate(candidate);
  if (result === true) {
    return null;
  }
  return `${result.err.msg} (line ${result.err.line}, column ${result.err.col})`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function splitName(name: string): { prefix: string; localName: string } {
  const colon = name.indexOf(':');
  return colon === -1
    ? { prefix: '', localName: name }
    : { prefix: name.substring(0, colon), localName: name.substring(colon + 1) };
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const attributes: Record<string, string> = {};
  const raw = node[':@'];
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        attributes[key.substring(ATTRIBUTE_PREFIX.length)] = String(value);
      }
    }
  }
  return attributes;
}

/**
 * Convert fast-xml-parser preserveOrder output into XmlElements,
 * resolving prefixes against the xmlns declarations in scope.
 */
function toElements(nodes: unknown[], scope: Map<string, string>): XmlElement[] {
  const elements: XmlElement[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    const name = Object.keys(node).find((key) => key !== ':@' && key !== '#text');
    if (!name || name.startsWith('?') || name.startsWith('!')) continue;

    const attributes = readAttributes(node);
    const localScope = new Map(scope);
    for (const [attr, value] of Object.entries(attributes)) {
      if (attr === 'xmlns') {
        localScope.set('', value);
      } else if (attr.startsWith('xmlns:')) {
        localScope.set(attr.substring('xmlns:'.length), value);
      }
    }

    const content = node[name];
    const rawChildren: unknown[] = Array.isArray(content) ? content : [];
    const { prefix, localName } = splitName(name);

    elements.push({
      name,
      localName,
      namespace: localScope.get(prefix) ?? '',
      attributes,
      children: toElements(rawChildren, localScope),
      text: collectText(rawChildren),
      rawChildren,
    });
  }

  return elements;
}

function collectText(nodes: unknown[]): string {
  let text = '';
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const value = node['#text'];
    if (value !== undefined) {
      text += String(value);
      continue;
    }
    for (const [key, children] of Object.entries(node)) {
      if (key !== ':@' && Array.isArray(children)) {
        text += collectText(children);
      }
    }
  }
  return text;
}

function parseDocument(xml: string, label: 'Response' | 'Payload'): XmlElement[] {
  const problem = checkWellFormed(xml);
  if (problem !== null) {
    throw new EnvelopeParseError(`${label} is not well-formed XML: ${problem}`, xml);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml.replace(/^\uFEFF/, '').trimStart());
  } catch (error) {
    throw new EnvelopeParseError(`${label} could not be parsed: ${errorMessage(error)}`, xml, { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new EnvelopeParseError(`${label} could not be parsed: unexpected parser output`, xml);
  }
  return toElements(parsed, new Map([['xml', 'http://www.w3.org/XML/1998/namespace']]));
}

/**
 * Depth-first, document-order search
 */
function findFirst(elements: XmlElement[], predicate: (element: XmlElement) => boolean): XmlElement | null {
  for (const element of elements) {
    if (predicate(element)) {
      return element;
    }
    const nested = findFirst(element.children, predicate);
    if (nested) {
      return nested;
    }
  }
  return null;
}

/**
 * Locate the Fault element: SOAP 1.1 namespace first, then a bare, un-namespaced <Fault>.
 */
function findFault(roots: XmlElement[]): XmlElement | null {
  return (
    findFirst(
      roots,
      (el) => el.localName === 'Fault' && el.namespace === SOAP_NAMESPACES.SOAP_1_1_ENVELOPE
    ) ?? findFirst(roots, (el) => el.name === 'Fault' && el.namespace === '')
  );
}

function findFaultPart(fault: XmlElement, localName: string): XmlElement | null {
  const direct = fault.children.find((child) => child.localName === localName);
  if (direct) {
    return direct;
  }
  return findFirst(
    fault.children.filter((child) => child.localName.toLowerCase() !== 'detail'),
    (el) => el.localName === localName
  );
}

function readFault(fault: XmlElement): SoapFault {
  const faultCode = findFaultPart(fault, 'faultcode')?.text.trim() ?? '';
  const faultString = findFaultPart(fault, 'faultstring')?.text.trim() ?? '';
  const detailElement = fault.children.find((child) => child.localName.toLowerCase() === 'detail');

  const result: SoapFault = { faultCode, faultString };
  if (detailElement) {
    result.detail = detailElement.rawChildren.length > 0 ? String(builder.build(detailElement.rawChildren)).trim() : '';
  }
  return result;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Inner content of the Body element exactly as it appears in `xml`.
 * Comments, CDATA sections and processing instructions are skipped while
 * scanning, so markup quoted inside them is never taken for a tag.
 */
function sliceBodyContent(xml: string, bodyName: string): string | null {
  const tokens = new RegExp(
    `<!--[\\s\\S]*?-->|<!\\[CDATA\\[[\\s\\S]*?\\]\\]>|<\\?[\\s\\S]*?\\?>|<(/?)${escapeRegExp(bodyName)}(?=[\\s/>])[^>]*>`,
    'g'
  );

  let depth = 0;
  let start = -1;
  for (let match = tokens.exec(xml); match !== null; match = tokens.exec(xml)) {
    const slash = match[1];
    if (slash === undefined) {
      continue;
    }
    const tag = match[0];
    if (slash === '') {
      if (tag.endsWith('/>')) {
        if (depth === 0) return '';
        continue;
      }
      if (depth === 0) {
        start = match.index + tag.length;
      }
      depth++;
    } else if (depth > 0) {
      depth--;
      if (depth === 0) {
        return xml.substring(start, match.index);
      }
    }
  }
  return null;
}

function findBody(roots: XmlElement[]): XmlElement | null {
  const envelope = roots.find((el) => el.localName === 'Envelope');
  if (!envelope) {
    return null;
  }
  return (
    envelope.children.find(
      (el) => el.localName === 'Body' && el.namespace === SOAP_NAMESPACES.SOAP_1_1_ENVELOPE
    ) ??
    envelope.children.find((el) => el.name === 'Body') ??
    null
  );
}

/**
 * Local name of the payload's root element, used as the operation name when
 * none is configured (document/literal: the body root names the operation).
 * Null when the payload is not a single-rooted document, e.g. a fragment of
 * sibling elements.
 */
export function resolveOperationName(bodyXml: string): string | null {
  try {
    const roots = parseDocument(stripXmlDeclaration(bodyXml), 'Payload');
    return roots[0]?.localName ?? null;
  } catch (error) {
    if (error instanceof EnvelopeParseError) {
      return null;
    }
    throw error;
  }
}

/**
 * Build a SOAP 1.1 envelope around `bodyXml`.
 * The fragment is not validated; the SOAPAction defaults to the operation name.
 */
export function buildEnvelope(operationName: string, bodyXml: string, soapAction?: string): SoapEnvelope {
  const body = stripXmlDeclaration(bodyXml);
  const xml =
    `<?xml version="1.0" encoding="UTF-8"?>\n` +
    `<${ENVELOPE_PREFIX}:Envelope xmlns:${ENVELOPE_PREFIX}="${SOAP_NAMESPACES.SOAP_1_1_ENVELOPE}">\n` +
    `  <${ENVELOPE_PREFIX}:Header/>\n` +
    `  <${ENVELOPE_PREFIX}:Body>${body}</${ENVELOPE_PREFIX}:Body>\n` +
    `</${ENVELOPE_PREFIX}:Envelope>`;

  return {
    operationName,
    soapAction: soapAction ?? operationName,
    xml,
  };
}

/**
 * Classify a response document.
 *
 * @throws EnvelopeParseError when `rawXml` is not well-formed
 */
export function parseResponse(rawXml: string, httpStatus?: number): ParsedResponse {
  const roots = parseDocument(rawXml, 'Response');

  const faultElement = findFault(roots);
  if (faultElement) {
    const fault = readFault(faultElement);
    return {
      kind: 'functional-failure',
      fault,
      error: new FunctionalError(fault.faultCode, fault.faultString, fault.detail),
      httpStatus,
    };
  }

  const body = findBody(roots);
  const content = body ? sliceBodyContent(rawXml, body.name) : null;

  return {
    kind: 'success',
    responseXml: content ?? rawXml,
    httpStatus,
  };
}

/**
 * Content type for SOAP 1.1 requests
 */
export function getSoapContentType(): string {
  return 'text/xml; charset=utf-8';
}
