import { AndroidDevice } from '../types';

const KNOWN_STATUSES: ReadonlyArray<AndroidDevice['status']> = [
  'device',
  'offline',
  'unauthorized',
  'recovery',
  'sideload',
  'bootloader',
];

function toStatus(value: string): AndroidDevice['status'] {
  return KNOWN_STATUSES.find(status => status === value) ?? 'unknown';
}

// Parse device list from `adb devices -l` output
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
  const devices: AndroidDevice[] = [];

  for (const line of lines) {
    // adb prints "* daemon started successfully" ahead of the header when it had to start the server
    if (line.startsWith('*') || line.startsWith('List of devices')) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const device: AndroidDevice = {
      id: parts[0],
      status: toStatus(parts[1]),
    };

    for (const part of parts.slice(2)) {
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      } else if (part.startsWith('usb:')) {
        device.usb = part.substring(4);
      }
    }

    devices.push(device);
  }

  return devices;
}

// Devices that are authorized and booted into Android
export function availableDevices(devices: AndroidDevice[]): AndroidDevice[] {
  return devices.filter(device => device.status === 'device');
}

export function describeDevice(device: AndroidDevice): string {
  const extras = [device.model && `model:${device.model}`, device.product && `product:${device.product}`]
    .filter(Boolean)
    .join(' ');
  return extras ? `${device.id} (${extras})` : device.id;
}

/**
 * Maps a 1-based menu answer to a device. Anything that is not a listed
 * number yields undefined.
 */
export function pickByIndex(devices: AndroidDevice[], answer: string): AndroidDevice | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const index = Number(trimmed);
  return index >= 1 && index <= devices.length ? devices[index - 1] : undefined;
}
