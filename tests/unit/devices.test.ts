import { availableDevices, describeDevice, parseDeviceList, pickByIndex } from '../../src/utils/devices';
import { mockDeviceListOutput, mockTwoDeviceListOutput } from '../mocks/workbench.mock';

describe('Device utilities', () => {
  describe('parseDeviceList', () => {
    it('should parse device list correctly', () => {
      const devices = parseDeviceList(mockDeviceListOutput);

      expect(devices).toEqual([
        {
          id: 'emulator-5554',
          status: 'device',
          product: 'sdk_gphone64_x86_64',
          model: 'sdk_gphone64_x86_64',
          transportId: '1',
        },
      ]);
    });

    it('should skip the header and daemon notices', () => {
      const output = `* daemon not running; starting now at tcp:5037
* daemon started successfully
List of devices attached
R58N12ABCDE            unauthorized usb:1-1 transport_id:3
`;
      const devices = parseDeviceList(output);

      expect(devices).toEqual([
        { id: 'R58N12ABCDE', status: 'unauthorized', usb: '1-1', transportId: '3' },
      ]);
    });

    it('should return nothing for an empty listing', () => {
      expect(parseDeviceList('List of devices attached\n\n')).toEqual([]);
    });
  });

  describe('availableDevices', () => {
    it('should keep only authorized devices booted into Android', () => {
      const devices = parseDeviceList(`List of devices attached
emulator-5554          device model:Pixel_7
emulator-5556          offline
R58N12ABCDE            unauthorized
`);

      expect(availableDevices(devices).map(device => device.id)).toEqual(['emulator-5554']);
    });
  });

  describe('describeDevice', () => {
    it('should show model and product when known', () => {
      const [first, second] = parseDeviceList(mockTwoDeviceListOutput);

      expect(describeDevice(first)).toBe('emulator-5554 (model:sdk_gphone64_x86_64 product:sdk_gphone64_x86_64)');
      expect(describeDevice(second)).toBe('R58N12ABCDE (model:SM_G973F product:beyond1)');
      expect(describeDevice({ id: 'abc', status: 'device' })).toBe('abc');
    });
  });

  describe('pickByIndex', () => {
    const devices = parseDeviceList(mockTwoDeviceListOutput);

    it('should map a 1-based answer to a device', () => {
      expect(pickByIndex(devices, ' 2 ')?.id).toBe('R58N12ABCDE');
    });

    it.each(['0', '3', 'x', '', '1.5', '-1'])('should reject %p', answer => {
      expect(pickByIndex(devices, answer)).toBeUndefined();
    });
  });
});
