/**
 * Keel Kernel — Native Resource Types
 *
 * Validation pipelines for the built-in resource types. Each type lists its
 * parameters in declaration order; that order is the order validators run.
 * Parameters carrying `nameval` rewrite the resource title, so these
 * pipelines must run before a resource is keyed into a catalog.
 */

import type { ParameterRules, ParameterValidator } from '../validation/combinators.js';
import {
  defaultvalue,
  fullyQualified,
  fullyQualifieds,
  inrange,
  integer,
  integers,
  ipaddr,
  mandatory,
  mandatoryIfNotAbsent,
  nameval,
  noTrailingSlash,
  rarray,
  string,
  strings,
  validateSourceOrContent,
  values,
} from '../validation/combinators.js';
import type { TypeMethods } from '../validation/pipeline.js';
import { typeMethods } from '../validation/pipeline.js';
import { TypeRegistry } from './type-registry.js';

const flag: ReadonlyArray<ParameterValidator> = [string, values(['true', 'false'])];
const presence: ReadonlyArray<ParameterValidator> = [
  defaultvalue('present'),
  string,
  values(['present', 'absent']),
];
const list: ReadonlyArray<ParameterValidator> = [rarray, strings];
const text: ReadonlyArray<ParameterValidator> = [string];

const cron: ParameterRules = [
  ['name', [nameval]],
  ['ensure', presence],
  ['command', [string, mandatoryIfNotAbsent]],
  ['environment', list],
  ['hour', text],
  ['minute', text],
  ['month', text],
  ['monthday', text],
  ['weekday', text],
  ['special', [string, values(['reboot', 'yearly', 'annually', 'monthly', 'weekly', 'daily', 'midnight', 'hourly'])]],
  ['target', text],
  ['user', [defaultvalue('root'), string]],
];

const exec: ParameterRules = [
  ['command', [nameval]],
  ['creates', [rarray, fullyQualifieds]],
  ['cwd', [string, fullyQualified]],
  ['environment', list],
  ['group', text],
  ['logoutput', [string, values(['true', 'false', 'on_failure'])]],
  ['onlyif', text],
  ['path', list],
  ['provider', [string, values(['posix', 'shell', 'windows'])]],
  ['refresh', text],
  ['refreshonly', flag],
  ['returns', [rarray, integers]],
  ['timeout', [integer]],
  ['tries', [integer]],
  ['try_sleep', [integer]],
  ['unless', text],
  ['user', text],
];

const file: ParameterRules = [
  ['path', [nameval, fullyQualified, noTrailingSlash]],
  ['ensure', [defaultvalue('present'), string, values(['present', 'absent', 'file', 'directory', 'link'])]],
  ['backup', text],
  ['checksum', [string, values(['md5', 'md5lite', 'sha256', 'sha256lite', 'mtime', 'ctime', 'none'])]],
  ['content', text],
  ['force', flag],
  ['group', text],
  ['ignore', list],
  ['links', [string, values(['follow', 'manage'])]],
  ['mode', text],
  ['owner', text],
  ['purge', flag],
  ['recurse', [string, values(['true', 'false', 'remote'])]],
  ['recurselimit', [integer]],
  ['replace', [string, values(['true', 'false', 'yes', 'no'])]],
  ['source', list],
  ['target', text],
  ['validate_cmd', text],
];

const group: ParameterRules = [
  ['name', [nameval]],
  ['ensure', presence],
  ['allowdupe', flag],
  ['gid', [integer]],
  ['members', list],
  ['system', flag],
];

const host: ParameterRules = [
  ['name', [nameval]],
  ['ensure', presence],
  ['comment', text],
  ['host_aliases', list],
  ['ip', [string, mandatoryIfNotAbsent, ipaddr]],
  ['target', [string, fullyQualified]],
];

const mount: ParameterRules = [
  ['name', [nameval, fullyQualified]],
  ['ensure', [defaultvalue('present'), string, values(['present', 'absent', 'mounted', 'unmounted', 'defined'])]],
  ['atboot', [string, values(['yes', 'no', 'true', 'false'])]],
  ['blockdevice', text],
  ['device', [string, mandatoryIfNotAbsent]],
  ['dump', [integer, inrange(0, 2)]],
  ['fstype', [string, mandatoryIfNotAbsent]],
  ['options', text],
  ['pass', [integer]],
  ['remounts', flag],
  ['target', [string, fullyQualified]],
];

const notify: ParameterRules = [
  ['name', [nameval]],
  ['message', text],
  ['withpath', flag],
];

const pkg: ParameterRules = [
  ['name', [nameval]],
  ['ensure', [defaultvalue('present'), string]],
  ['adminfile', [string, fullyQualified]],
  ['allowcdrom', flag],
  ['configfiles', [string, values(['keep', 'replace'])]],
  ['install_options', [rarray]],
  ['provider', text],
  ['responsefile', [string, fullyQualified]],
  ['source', text],
  ['uninstall_options', [rarray]],
];

const service: ParameterRules = [
  ['name', [nameval]],
  ['ensure', [string, values(['running', 'stopped', 'true', 'false'])]],
  ['binary', text],
  ['control', text],
  ['enable', [string, values(['true', 'false', 'manual', 'mask'])]],
  ['flags', text],
  ['hasrestart', flag],
  ['hasstatus', flag],
  ['manifest', text],
  ['path', [rarray, fullyQualifieds]],
  ['pattern', text],
  ['provider', text],
  ['restart', text],
  ['start', text],
  ['status', text],
  ['stop', text],
];

const sshAuthorizedKey: ParameterRules = [
  ['name', [nameval]],
  ['ensure', presence],
  ['key', [string, mandatoryIfNotAbsent]],
  ['options', list],
  ['target', [string, fullyQualified]],
  [
    'type',
    [
      string,
      mandatoryIfNotAbsent,
      values(['ssh-dss', 'ssh-rsa', 'ssh-ed25519', 'ecdsa-sha2-nistp256', 'ecdsa-sha2-nistp384', 'ecdsa-sha2-nistp521']),
    ],
  ],
  ['user', text],
];

const user: ParameterRules = [
  ['name', [nameval]],
  ['ensure', [string, values(['present', 'absent', 'role'])]],
  ['allowdupe', flag],
  ['comment', text],
  ['expiry', text],
  ['gid', text],
  ['groups', list],
  ['home', [string, fullyQualified]],
  ['managehome', flag],
  ['membership', [string, values(['inclusive', 'minimum'])]],
  ['password', text],
  ['password_max_age', [integer]],
  ['password_min_age', [integer]],
  ['shell', [string, fullyQualified]],
  ['system', flag],
  ['uid', [integer]],
];

const zoneRecord: ParameterRules = [
  ['name', [nameval]],
  ['ensure', presence],
  ['owner', [string, mandatory]],
  ['dest', [string, mandatory]],
  ['rtype', [string, mandatory, values(['A', 'AAAA', 'CNAME', 'MX', 'NS', 'PTR', 'SRV', 'TXT'])]],
  ['target', [string, mandatory, fullyQualified]],
  ['ttl', [integer, inrange(0, 2147483647)]],
];

/** The built-in types and their pipelines. */
export const NATIVE_TYPES: ReadonlyArray<readonly [string, TypeMethods]> = [
  ['cron', typeMethods(cron)],
  ['exec', typeMethods(exec)],
  ['file', typeMethods(file, validateSourceOrContent)],
  ['group', typeMethods(group)],
  ['host', typeMethods(host)],
  ['mount', typeMethods(mount)],
  ['notify', typeMethods(notify)],
  ['package', typeMethods(pkg)],
  ['service', typeMethods(service)],
  ['ssh_authorized_key', typeMethods(sshAuthorizedKey)],
  ['user', typeMethods(user)],
  ['zone_record', typeMethods(zoneRecord)],
];

/**
 * A registry holding the native types plus any additional entries.
 *
 * @throws {Error} If an additional entry reuses a native type name
 */
export function createNativeRegistry(
  additional: Iterable<readonly [string, TypeMethods]> = [],
): TypeRegistry {
  return new TypeRegistry([...NATIVE_TYPES, ...additional]);
}
