export const LAND_STATION = 'AAXX 01004 88889 12782 61506 10094 20047 30111 40197 53007 60001 70102 81541 333 10178 21073 34101';

export const BUOY = 'BBXX 51002 19001 99170 71577 46/// /0709 10267 20232 30132 40135 92350 22251 00268 10804 20604 '
  + '310// 40802 61234 70021 80092 333 91212 555 11102 22108 8//10 92344';

export const MOBILE_LAND_STATION = 'OOXX AAATN 18214 99759 50874 56057 12501 46/// /1219 11259 38338 49778 5//// 92100';

export const ANTARCTIC_STATION = 'AAXX 20104 89646 46/// /2299 00113 29079 37708 42010 333 01268';

export const REGION_I_STATION = 'AAXX 20064 67005 12570 50402 60004 333 02434';

export const SHIP_WITH_ICE = 'BBXX ZDLP 19004 99607 50455 41298 81307 10001 21004 49894 52012 70211 886// 22200 04019 '
  + '20000 300// 40000 5//// 81001 ICE icy conditions';
