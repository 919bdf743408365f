const PROPERTY_ID_PATTERN = /^\d+$/;
const RESOURCE_NAME_PATTERN = /^properties\/(\d+)$/;

export interface PropertyProps {
  id: string;
  resourceName?: string | undefined;
  displayName: string;
  accountId: string;
  accountName?: string | undefined;
  propertyType?: string | undefined;
}

/**
* Extract a numeric property id from "123" or "properties/123"
* @returns The id, or undefined when the reference is not an id
*/
export function parsePropertyId(reference: string): string | undefined {
  const trimmed = reference.trim();
  if (PROPERTY_ID_PATTERN.test(trimmed)) return trimmed;
  const match = RESOURCE_NAME_PATTERN.exec(trimmed);
  return match?.[1];
}

/**
* Property - Immutable domain entity for one GA4 property
*
* Identity is the numeric id. Instances are built once per discovery and are
* only read afterwards.
*/
export class Property {
  private constructor(
  public readonly id: string,
  public readonly resourceName: string,
  public readonly displayName: string,
  public readonly accountId: string,
  public readonly accountName: string | undefined,
  public readonly propertyType: string | undefined
  ) {}

  /**
  * Create a property from discovery data
  * @throws Error when the id is not numeric
  */
  static create(props: PropertyProps): Property {
  const id = parsePropertyId(props.id);
  if (!id) {
    throw new Error(`Invalid GA4 property id: '${props.id}'`);
  }
  const displayName = props.displayName.trim() || `Property ${id}`;
  return new Property(
    id,
    props.resourceName || `properties/${id}`,
    displayName,
    props.accountId,
    props.accountName,
    props.propertyType
  );
  }

  /**
  * Name used in messages, e.g. "My Blog (111)"
  */
  get label(): string {
  return `${this.displayName} (${this.id})`;
  }
}
