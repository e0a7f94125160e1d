/**
 * Settings a workflow exposes to the client (model name, temperature, ...)
 */

import { z } from 'zod';

const settingBase = {
  id: z.string().min(1),
  label: z.string(),
  description: z.string().optional(),
};

export const textSettingSchema = z.object({
  type: z.literal('text'),
  ...settingBase,
  initial: z.string(),
});

export const selectSettingSchema = z
  .object({
    type: z.literal('select'),
    ...settingBase,
    values: z.array(z.string()).min(1),
    initial: z.string(),
  })
  .refine((setting) => setting.values.includes(setting.initial), {
    message: 'initial must be one of values',
    path: ['initial'],
  });

export const switchSettingSchema = z.object({
  type: z.literal('switch'),
  ...settingBase,
  initial: z.boolean(),
});

export const sliderSettingSchema = z
  .object({
    type: z.literal('slider'),
    ...settingBase,
    min: z.number(),
    max: z.number(),
    step: z.number().positive(),
    initial: z.number(),
  })
  .refine((setting) => setting.initial >= setting.min && setting.initial <= setting.max, {
    message: 'initial must lie within [min, max]',
    path: ['initial'],
  });

export const chatSettingSchema = z.union([
  textSettingSchema,
  selectSettingSchema,
  switchSettingSchema,
  sliderSettingSchema,
]);

export type TextSetting = z.infer<typeof textSettingSchema>;
export type SelectSetting = z.infer<typeof selectSettingSchema>;
export type SwitchSetting = z.infer<typeof switchSettingSchema>;
export type SliderSetting = z.infer<typeof sliderSettingSchema>;
export type ChatSetting = z.infer<typeof chatSettingSchema>;

/**
 * The setting with `value` as its displayed value, or `undefined`
 * when the value does not fit the setting
 */
export function withInitialValue(
  setting: ChatSetting,
  value: unknown
): ChatSetting | undefined {
  const parsed = chatSettingSchema.safeParse({ ...setting, initial: value });
  return parsed.success ? parsed.data : undefined;
}

/**
 * Copies of `settings` whose displayed values come from `state` where it
 * has a field of the same name. Values that do not fit keep the default.
 */
export function resumeSettings(
  settings: readonly ChatSetting[],
  state?: Readonly<Record<string, unknown>>
): ChatSetting[] {
  return settings.map((setting) => {
    if (!state || !Object.hasOwn(state, setting.id)) return { ...setting };
    return withInitialValue(setting, state[setting.id]) ?? { ...setting };
  });
}
