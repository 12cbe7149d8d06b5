import { useEffect, useRef } from 'react';
import * as echarts from 'echarts';
import type { ThemeMode } from '../lib/chartOptions';

interface EChartProps {
  option: echarts.EChartsOption;
  theme: ThemeMode;
  className?: string;
}

export function EChart({ option, theme, className }: EChartProps) {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const instanceRef = useRef<echarts.ECharts | null>(null);
  const optionRef = useRef(option);
  optionRef.current = option;

  // The built-in dark theme can only be applied at init, so a theme switch rebuilds the instance.
  useEffect(() => {
    if (!containerRef.current) {
      return;
    }

    const instance = echarts.init(containerRef.current, theme === 'dark' ? 'dark' : undefined);
    instanceRef.current = instance;
    instance.setOption(optionRef.current);
    instance.resize();

    const resizeHandler = () => instance.resize();
    window.addEventListener('resize', resizeHandler);
    const observer = new ResizeObserver(() => instance.resize());
    observer.observe(containerRef.current);

    return () => {
      window.removeEventListener('resize', resizeHandler);
      observer.disconnect();
      instance.dispose();
      instanceRef.current = null;
    };
  }, [theme]);

  useEffect(() => {
    instanceRef.current?.setOption(option, true);
  }, [option]);

  return <div ref={containerRef} className={className ?? 'chart'} />;
}
