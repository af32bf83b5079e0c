export { NodeProcessRunner, findExecutable } from './process-runner';
export { IconConverter } from './icon-converter';
export { KeystrokeInjector } from './keystroke-injector';
export { SysfsDevice, discoverDevices } from './sysfs-device';
