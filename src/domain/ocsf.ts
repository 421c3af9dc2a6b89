/**
 * OCSF identifiers the pipeline understands.
 *
 * Only the classifiers the units act on are listed here; any other
 * value passes through untagged.
 */

/** Observable `type_id` values (OCSF observable object). */
export const ObservableType = {
  Hostname: 1,
  IpAddress: 2,
  UserName: 3,
  DomainName: 4,
  EmailAddress: 5,
  FileName: 7,
  Hash: 8,
  ProcessName: 9,
  Port: 14,
  UserAgent: 22,
  Url: 23,
} as const;

export type ObservableTypeId = (typeof ObservableType)[keyof typeof ObservableType];

/**
 * Observable types worth a threat-intel lookup. User names, process
 * names, ports and user agents are rarely present in intel feeds.
 */
export const THREAT_INTEL_TYPES: ReadonlySet<number> = new Set<number>([
  ObservableType.Hostname,
  ObservableType.IpAddress,
  ObservableType.DomainName,
  ObservableType.EmailAddress,
  ObservableType.FileName,
  ObservableType.Hash,
  ObservableType.Url,
]);

export const ClassUid = {
  ProcessActivity: 1007,
  DetectionFinding: 2004,
} as const;

/** Semantic labels written as `tag.<key>=<value>`. */
export type SemanticTags = Readonly<Record<string, string>>;

export function classLabels(classUid: number): SemanticTags {
  switch (classUid) {
    case 2004:
      return { category: 'detection', type: 'alert' };
    case 5001:
      return { category: 'asset', type: 'inventory' };
    case 4001:
    case 4002:
    case 4003:
      return { category: 'network', type: 'activity' };
    case 3001:
    case 3002:
      return { category: 'authentication' };
    case 1001:
    case 1002:
    case 1003:
      return { category: 'system', type: 'process' };
    default:
      return {};
  }
}

export function severityLabels(severityId: number): SemanticTags {
  switch (severityId) {
    case 1:
      return { severity: 'informational', priority: 'low' };
    case 2:
      return { severity: 'low', priority: 'low' };
    case 3:
      return { severity: 'medium', priority: 'medium' };
    case 4:
      return { severity: 'high', priority: 'high' };
    case 5:
    case 6:
      return { severity: 'critical', priority: 'critical' };
    default:
      return {};
  }
}

export function categoryLabels(categoryUid: number): SemanticTags {
  switch (categoryUid) {
    case 1:
      return { domain: 'system' };
    case 2:
      return { domain: 'findings' };
    case 3:
      return { domain: 'identity' };
    case 4:
      return { domain: 'network' };
    case 5:
      return { domain: 'discovery' };
    default:
      return {};
  }
}
