import { centerOfBounds, extractUiNodes, findNodes } from '../../src/utils/ui.js';
import { mockUiHierarchy } from '../mocks/adb.mock.js';

describe('UI hierarchy parsing', () => {
  const nodes = extractUiNodes(mockUiHierarchy);

  describe('extractUiNodes', () => {
    it('should return every node in document order', () => {
      expect(nodes.map(node => node.className)).toEqual([
        'android.widget.FrameLayout',
        'android.widget.Button',
        'android.widget.TextView',
      ]);
    });

    it('should read attributes and bounds', () => {
      expect(nodes[1]).toEqual({
        text: 'Sign in',
        resourceId: 'com.example:id/login',
        contentDesc: 'Sign in button',
        className: 'android.widget.Button',
        clickable: true,
        enabled: true,
        bounds: { x1: 100, y1: 200, x2: 301, y2: 401 },
      });
    });

    it('should decode XML entities', () => {
      expect(nodes[2].text).toBe('Tom & Jerry');
    });

    it('should decode each entity once', () => {
      const [node] = extractUiNodes('<node text="&#38;lt;b&#38;gt; &amp;amp;" class="android.view.View"/>');

      expect(node.text).toBe('&lt;b&gt; &amp;');
    });

    it('should keep numeric references outside the Unicode range as written', () => {
      const [node] = extractUiNodes('<node text="a&#99999999;b&#x41;" class="android.view.View"/>');

      expect(node.text).toBe('a&#99999999;bA');
    });

    it('should leave bounds undefined when missing', () => {
      const [node] = extractUiNodes('<node text="x" class="android.view.View" enabled="false"/>');

      expect(node.bounds).toBeUndefined();
      expect(node.enabled).toBe(false);
      expect(node.resourceId).toBe('');
    });
  });

  describe('findNodes', () => {
    it('should require every given criterion to match exactly', () => {
      expect(findNodes(nodes, { text: 'Sign in', className: 'android.widget.Button' })).toEqual([nodes[1]]);
      expect(findNodes(nodes, { text: 'Sign', className: 'android.widget.Button' })).toEqual([]);
    });

    it('should return nothing without criteria', () => {
      expect(findNodes(nodes, {})).toEqual([]);
    });
  });

  describe('centerOfBounds', () => {
    it('should round the midpoint down', () => {
      expect(centerOfBounds({ x1: 100, y1: 200, x2: 301, y2: 401 })).toEqual({ x: 200, y: 300 });
    });
  });
});
