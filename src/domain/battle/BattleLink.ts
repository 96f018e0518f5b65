import { BattleLinkMode } from '../../shared/enums';
import { parseRelatedTime } from '../../shared/utilities/time';

// /br/related/<system_id>/<YYYYMMDDHHMM>/
const RELATED_LINK_PATTERN = /(https?:\/\/(?:www\.)?warbeacon\.net\/br\/related\/(\d+)\/(\d{12})\/?)/;

// /br/report/<uuid>/
const REPORT_LINK_PATTERN = /(https?:\/\/(?:www\.)?warbeacon\.net\/br\/report\/([0-9a-fA-F-]+)\/?)/;

export interface SingleSystemLink {
  readonly mode: BattleLinkMode.SINGLE_SYSTEM;
  readonly url: string;
  readonly systemId: number;
  readonly timestamp: string;
}

export interface MultiSystemLink {
  readonly mode: BattleLinkMode.MULTI_SYSTEM;
  readonly url: string;
  readonly reportId: string;
}

export type BattleLink = SingleSystemLink | MultiSystemLink;

/**
 * Find the first battle report link in free-form chat text.
 * Related links take precedence over combined reports. Never throws.
 */
export function matchBattleLink(text: string): BattleLink | null {
  const related = RELATED_LINK_PATTERN.exec(text);
  if (related) {
    const [, url, rawSystemId, timestamp] = related;
    const systemId = Number(rawSystemId);
    if (Number.isSafeInteger(systemId) && parseRelatedTime(timestamp)) {
      return { mode: BattleLinkMode.SINGLE_SYSTEM, url, systemId, timestamp };
    }
  }

  const report = REPORT_LINK_PATTERN.exec(text);
  if (report) {
    const [, url, reportId] = report;
    return { mode: BattleLinkMode.MULTI_SYSTEM, url, reportId };
  }

  return null;
}
