import { MalformedResponseError } from '../../domain/errors/archive.errors';
import {
  XmlNode,
  attribute,
  child,
  children,
  parseXml,
  textOf,
} from './xml-document';

/**
 * VOTable (TABLEDATA serialisation) reader for TAP, SIA2 and DataLink responses.
 */

export type VoTableRow = Readonly<Record<string, string>>;

export interface VoTableInfo {
  name: string;
  value: string;
  text: string;
}

export interface VoTableParam {
  name: string;
  value: string;
}

export interface VoTable {
  fields: string[];
  rows: VoTableRow[];
}

export interface VoTableResource {
  type?: string;
  id?: string;
  infos: VoTableInfo[];
  params: VoTableParam[];
  tables: VoTable[];
}

export interface VoTableDocument {
  infos: VoTableInfo[];
  resources: VoTableResource[];
}

export interface QueryStatus {
  status: string;
  message?: string;
}

export function parseVoTable(xml: string): VoTableDocument {
  const document = parseXml(xml, 'VOTable response');
  const root = child(document, 'VOTABLE');
  if (!root) {
    throw new MalformedResponseError('Response is not a VOTable document');
  }

  return {
    infos: children(root, 'INFO').map(readInfo),
    resources: children(root, 'RESOURCE').map(readResource),
  };
}

/** First table of the results resource, or of the first resource when none is typed */
export function resultsTable(document: VoTableDocument): VoTable | undefined {
  const resource =
    document.resources.find((candidate) => candidate.type === 'results') ??
    document.resources.find((candidate) => candidate.type === undefined);
  return resource?.tables[0];
}

export function findResource(
  document: VoTableDocument,
  type: string,
  id: string,
): VoTableResource | undefined {
  return document.resources.find((resource) => resource.type === type && resource.id === id);
}

export function paramValue(resource: VoTableResource, name: string): string | undefined {
  return resource.params.find((param) => param.name === name)?.value;
}

/**
 * QUERY_STATUS reported by a TAP service, looked up on the results resource
 * first and then on the document root.
 */
export function queryStatus(document: VoTableDocument): QueryStatus | undefined {
  const candidates = [
    ...document.resources.filter((resource) => resource.type === 'results').flatMap((resource) => resource.infos),
    ...document.infos,
  ];
  const info = candidates.find((candidate) => candidate.name === 'QUERY_STATUS');
  if (!info) {
    return undefined;
  }
  return { status: info.value, message: info.text || undefined };
}

function readInfo(node: XmlNode): VoTableInfo {
  return {
    name: attribute(node, 'name') ?? '',
    value: attribute(node, 'value') ?? '',
    text: textOf(node).trim(),
  };
}

function readResource(node: XmlNode): VoTableResource {
  return {
    type: attribute(node, 'type'),
    id: attribute(node, 'ID'),
    infos: children(node, 'INFO').map(readInfo),
    params: children(node, 'PARAM').map((param) => ({
      name: attribute(param, 'name') ?? '',
      value: attribute(param, 'value') ?? '',
    })),
    tables: children(node, 'TABLE').map(readTable),
  };
}

function readTable(node: XmlNode): VoTable {
  const fields = children(node, 'FIELD').map((field, index) => attribute(field, 'name') ?? `col${index}`);
  const data = child(node, 'DATA');

  if (data && !('TABLEDATA' in data)) {
    const serialisation = Object.keys(data).find((key) => !key.startsWith('@_')) ?? 'unknown';
    throw new MalformedResponseError(`Unsupported VOTable serialisation ${serialisation}; only TABLEDATA is read`);
  }

  const tableData = data ? child(data, 'TABLEDATA') : undefined;
  const rows = tableData ? children(tableData, 'TR').map((tr) => readRow(fields, tr)) : [];

  return { fields, rows };
}

function readRow(fields: string[], tr: XmlNode): VoTableRow {
  const cells = children(tr, 'TD').map((td) => textOf(td).trim());
  if (cells.length !== fields.length) {
    throw new MalformedResponseError(
      `VOTable row has ${cells.length} cells but the table declares ${fields.length} fields`,
    );
  }
  return Object.fromEntries(fields.map((field, index) => [field, cells[index]]));
}
