/**
 * Namespace-tolerant XML element.
 *
 * Element and attribute names carry no namespace prefix: `ns:Numero` and
 * `Numero` both become `Numero`.
 */
export interface GenericXmlNode {
  localName: string;

  /** Attribute values, entity-decoded */
  attributes: Record<string, string>;

  /** Direct text and CDATA content, entity-decoded and trimmed ('' if none) */
  text: string;

  children: GenericXmlNode[];
}
