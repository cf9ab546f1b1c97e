/**
 * User type mapping
 */

import { getLogger } from '@callbridge/core';

const log = getLogger('rules.user-type');

export const OTHER_USER_TYPE = 99;

const USER_TYPE_CODES: Readonly<Record<string, number>> = {
  User: 1,
  DigitalUser: 2,
  FlexibleUser: 1,
  FaxUser: 99,
  VirtualUser: 99,
  Department: 99,
  Announcement: 99,
  Voicemail: 99,
  SharedLinesGroup: 99,
  PagingOnly: 99,
  IvrMenu: 99,
  ApplicationExtension: 99,
  ParkLocation: 99,
  Limited: 99,
  Bot: 99,
  ProxyAdmin: 99,
  DelegatedLinesGroup: 99,
  Site: 99,
};

/** Source extension type name to the target's integer user type; 99 = other. */
export function mapUserType(type: string): number {
  const code = USER_TYPE_CODES[type];
  if (code === undefined) {
    log.warn(`Unknown user type, mapping to ${OTHER_USER_TYPE}`, { userType: type });
    return OTHER_USER_TYPE;
  }
  return code;
}
