/**
 * WHAT-IF ENGINE: Insight & Event Text
 *
 * One table per locale. Numbers arrive already formatted where the text
 * shows points.
 */

import type { EventType, Locale } from './whatif.contract.js';

export interface InsightMessages {
  priceUnchanged: string;
  priceRaised: (pct: number) => string;
  otherGain: (pts: string) => string;
  sevenLoss: (pts: string) => string;
  promotionIntensity: (intensity: number) => string;
  promotionPoints: (multiplier: number) => string;
  familyGain: (pts: string) => string;
  competitionWatch: string;
  competitionFreshGrad: string;
  externalSeasonal: string;
  fallback: string;
}

export const INSIGHT_MESSAGES: Record<Locale, InsightMessages> = {
  en: {
    priceUnchanged: 'Electricity price not raised; no significant change in spending behavior expected',
    priceRaised: (pct) => `Electricity price up ${pct}% tightens dining-out budgets`,
    otherGain: (pts) => `Value brands (Other) projected to gain ${pts} pts`,
    sevenLoss: (pts) => `7-11 projected to lose ${pts} pts as price-sensitive customers drift away`,
    promotionIntensity: (x) => `Promotion intensity ${x}x draws in price-sensitive customers`,
    promotionPoints: (x) => `${x}x loyalty points strengthen member retention`,
    familyGain: (pts) => `FamilyMart projected to benefit most (+${pts} pts)`,
    competitionWatch: 'Monitor competitor promotions and adjust strategy promptly',
    competitionFreshGrad: 'FamilyMart promotion pulls hardest on the Fresh_Grad persona',
    externalSeasonal: 'Weather and holiday factors drive a seasonal spending adjustment',
    fallback: 'Run an A/B test to validate the projected shift before acting on it',
  },
  'zh-TW': {
    priceUnchanged: '電價維持不變，消費行為無顯著變化',
    priceRaised: (pct) => `電價調漲 ${pct}% 將導致外食預算緊縮`,
    otherGain: (pts) => `平價品牌 Other 預估成長 ${pts} 百分點`,
    sevenLoss: (pts) => `7-11 預估下降 ${pts} 百分點 (價格敏感客群流失)`,
    promotionIntensity: (x) => `促銷強度 ${x}x 將有效吸引價格敏感客群`,
    promotionPoints: (x) => `點數 ${x}x 加成提升會員黏著度`,
    familyGain: (pts) => `全家便利商店預估獲益最大 (+${pts} 百分點)`,
    competitionWatch: '監測競合品牌促銷動態，及時調整策略',
    competitionFreshGrad: '全家冰淇淋促銷對新鮮人族群吸引力最強',
    externalSeasonal: '天氣/節慶因素帶動季節性消費調整',
    fallback: '建議進行 A/B test 驗證模型預測',
  },
};

export interface EventText {
  name: string;
  description: string;
}

export const EVENT_TEXT: Record<Locale, Record<EventType, EventText>> = {
  en: {
    price_change: {
      name: 'Electricity price change',
      description: 'Effect of a price change on spending behavior',
    },
    promotion: {
      name: 'Promotion',
      description: 'Effect of discounts and loyalty point campaigns',
    },
    competition: {
      name: 'Competitor action',
      description: 'Effect of a competitor campaign',
    },
    external: {
      name: 'External factor',
      description: 'Weather, holidays and other external factors',
    },
  },
  'zh-TW': {
    price_change: { name: '電價調漲', description: '模擬價格變化對消費行為的影響' },
    promotion: { name: '促銷活動', description: '模擬折扣、點數等促銷效果' },
    competition: { name: '競合變化', description: '模擬競爭對手動作' },
    external: { name: '外部因素', description: '天氣、節慶等外部因素' },
  },
};
