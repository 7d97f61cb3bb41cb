/**
 * Argument parsing and command handlers behind the `rosbridge` command.
 */

import { DEFAULT_BRIDGE_PORT } from './constants.js';
import { Param } from './core/param.js';
import { ValidationError } from './errors.js';
import type { Ros, TypeDef } from './ros.js';
import { createUrl } from './utils/config.js';

export interface CliOptions {
  url?: string;
  host?: string;
  port?: number;
  configPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
  command: string[];
}

export const USAGE = `
rosbridge - command line client for a rosbridge server

Usage: rosbridge [options] <command> <subcommand> [args]

Commands:
  topic list                 List active topics
  topic type <topic>         Print the message type of a topic
  topic find <type>          List topics of a message type
  msg info <type>            Print the fields of a message type
  service list               List active services
  service type <service>     Print the type of a service
  service find <type>        List services of a service type
  service info <service>     Print type, request and response of a service
  srv info <type>            Print request and response fields of a service type
  param list                 List parameter names
  param get <name>           Print a parameter as JSON
  param set <name> <json>    Set a parameter from a JSON value
  param delete <name>        Delete a parameter

Options:
  --url <url>          Bridge URL (default: ws://localhost:9090)
  -r, --host <host>    Bridge host, combined with --port
  -p, --port <port>    Bridge port (default: 9090)
  --config <path>      YAML client configuration
  --verbose            Log at debug level
  --version            Show version number
  --help               Show this help message

Environment variables:
  ROSBRIDGE_URL        Same as --url
  ROSBRIDGE_LOG_LEVEL  Log level (debug, info, warn, error)
`;

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    throw new ValidationError(`Missing value for ${flag}`, flag);
  }
  return value;
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false, version: false, command: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--url':
        options.url = requireValue(args, ++i, arg);
        break;
      case '-r':
      case '--host':
        options.host = requireValue(args, ++i, arg);
        break;
      case '-p':
      case '--port': {
        const raw = requireValue(args, ++i, arg);
        const port = Number(raw);
        if (!Number.isInteger(port) || port <= 0 || port > 65535) {
          throw new ValidationError(`Invalid port "${raw}"`, 'port');
        }
        options.port = port;
        break;
      }
      case '--config':
        options.configPath = requireValue(args, ++i, arg);
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--version':
      case '-v':
        options.version = true;
        break;
      default:
        options.command.push(arg);
    }
  }

  return options;
}

/** Bridge URL named on the command line, if any. `--url` wins over host and port. */
export function resolveCliUrl(options: CliOptions): string | undefined {
  if (options.url !== undefined) return options.url;
  if (options.host !== undefined) return createUrl(options.host, options.port ?? DEFAULT_BRIDGE_PORT);
  if (options.port !== undefined) return createUrl('localhost', options.port);
  return undefined;
}

export type Print = (line: string) => void;

function argAt(command: string[], index: number, name: string): string {
  const value = command[index];
  if (value === undefined) {
    throw new ValidationError(`Missing argument <${name}> for "${command.slice(0, 2).join(' ')}"`, name);
  }
  return value;
}

function printTypeDefs(typedefs: TypeDef[], print: Print): void {
  const [root, ...nested] = typedefs;
  if (!root) return;
  printFields(root, print);
  for (const typedef of nested) {
    print('');
    print(`${typedef.type}:`);
    printFields(typedef, print);
  }
}

function printFields(typedef: TypeDef, print: Print): void {
  typedef.fieldnames.forEach((name, index) => {
    const fieldType = typedef.fieldtypes[index] ?? '?';
    const arrayLength = typedef.fieldarraylen[index] ?? -1;
    const suffix = arrayLength === -1 ? '' : arrayLength === 0 ? '[]' : `[${arrayLength}]`;
    print(`${fieldType}${suffix} ${name}`);
  });
}

async function printServiceDefinition(ros: Ros, serviceType: string, print: Print): Promise<void> {
  const request = await ros.getServiceRequestDetails(serviceType);
  const response = await ros.getServiceResponseDetails(serviceType);
  printTypeDefs(request, print);
  print('---');
  printTypeDefs(response, print);
}

/**
 * Run one command against a connected client and print its result.
 * @throws ValidationError for an unknown command or a missing argument
 */
export async function runCommand(ros: Ros, command: string[], print: Print): Promise<void> {
  const [group, action] = command;
  const key = `${group ?? ''} ${action ?? ''}`;

  switch (key) {
    case 'topic list': {
      const { topics } = await ros.getTopics();
      topics.forEach(topic => print(topic));
      return;
    }
    case 'topic type':
      print(await ros.getTopicType(argAt(command, 2, 'topic')));
      return;
    case 'topic find':
      (await ros.getTopicsForType(argAt(command, 2, 'type'))).forEach(topic => print(topic));
      return;
    case 'msg info':
      printTypeDefs(await ros.getMessageDetails(argAt(command, 2, 'type')), print);
      return;
    case 'service list':
      (await ros.getServices()).forEach(service => print(service));
      return;
    case 'service type':
      print(await ros.getServiceType(argAt(command, 2, 'service')));
      return;
    case 'service find':
      (await ros.getServicesForType(argAt(command, 2, 'type'))).forEach(service => print(service));
      return;
    case 'service info': {
      const serviceType = await ros.getServiceType(argAt(command, 2, 'service'));
      print(`Type: ${serviceType}`);
      print('');
      await printServiceDefinition(ros, serviceType, print);
      return;
    }
    case 'srv info':
      await printServiceDefinition(ros, argAt(command, 2, 'type'), print);
      return;
    case 'param list':
      (await ros.getParams()).forEach(name => print(name));
      return;
    case 'param get': {
      const value = await new Param(ros, argAt(command, 2, 'name')).get();
      print(JSON.stringify(value));
      return;
    }
    case 'param set': {
      const name = argAt(command, 2, 'name');
      const raw = argAt(command, 3, 'json');
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch {
        throw new ValidationError(`Value for "${name}" is not valid JSON: ${raw}`, 'json');
      }
      await new Param(ros, name).set(value);
      return;
    }
    case 'param delete':
      await new Param(ros, argAt(command, 2, 'name')).delete();
      return;
    default:
      throw new ValidationError(`Unknown command "${command.join(' ')}". Run with --help for usage.`, 'command');
  }
}
